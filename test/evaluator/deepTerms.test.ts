import { describe, it } from "mocha";
import { expect } from "chai";

import { normalize, stepOnce } from "../../lib/evaluator/normalOrder.js";
import { substitute } from "../../lib/evaluator/substitution.js";
import { freeVariables } from "../../lib/evaluator/freeVariables.js";
import { ReductionContext } from "../../lib/evaluator/reductionContext.js";
import { alphaEquivalent } from "../../lib/terms/alphaEquivalence.js";
import {
  createApplication,
  mkVar,
  prettyPrintUntypedLambda,
  termSize,
  type UntypedLambda,
} from "../../lib/terms/lambda.js";
import { churchNumeral, mult, unChurchNumeral } from "../../lib/data/church.js";

const N = 20000;

// f (f (... (f x))) with n applications
function spine(n: number): UntypedLambda {
  let body: UntypedLambda = mkVar("x");
  for (let i = 0; i < n; i++) {
    body = createApplication(mkVar("f"), body);
  }
  return body;
}

describe("terms nested tens of thousands deep", () => {
  const big = churchNumeral(N);

  it("normalizes a numeral that is already normal", () => {
    const result = normalize(big);
    expect(unChurchNumeral(result)).to.equal(N);
    expect(stepOnce(big).altered).to.equal(false);
  });

  it("compares numerals", () => {
    expect(alphaEquivalent(big, churchNumeral(N))).to.equal(true);
    expect(alphaEquivalent(big, churchNumeral(N - 1))).to.equal(false);
  });

  it("prints a numeral", () => {
    const expected = "fn f => fn x => " + "f (".repeat(N - 1) + "f x" +
      ")".repeat(N - 1);
    expect(prettyPrintUntypedLambda(big)).to.equal(expected);
  });

  it("measures and collects free variables", () => {
    expect(termSize(big)).to.equal(2 * N + 3);
    expect([...freeVariables(spine(N))].sort()).to.deep.equal(["f", "x"]);
    expect(freeVariables(big).size).to.equal(0);
  });

  it("substitutes into a deep body", () => {
    const result = substitute(spine(N), "x", mkVar("y"), new ReductionContext());
    expect([...freeVariables(result)].sort()).to.deep.equal(["f", "y"]);
  });

  it("multiplies one hundred by one hundred", () => {
    const product = mult(churchNumeral(100), churchNumeral(100));
    expect(unChurchNumeral(product)).to.equal(10000);
  });
});
