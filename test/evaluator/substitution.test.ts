import { describe, it } from "mocha";
import { expect } from "chai";

import { substitute } from "../../lib/evaluator/substitution.js";
import { ReductionContext } from "../../lib/evaluator/reductionContext.js";
import { alphaEquivalent } from "../../lib/terms/alphaEquivalence.js";
import {
  mkUntypedAbs,
  mkVar,
  prettyPrintUntypedLambda,
} from "../../lib/terms/lambda.js";
import { term } from "../util/terms.js";

describe("substitute", () => {
  it("replaces a free occurrence", () => {
    const result = substitute(term("f x x"), "x", term("a b"), new ReductionContext());
    expect(prettyPrintUntypedLambda(result)).to.equal("f (a b) (a b)");
  });

  it("leaves other variables alone", () => {
    const body = mkVar("y");
    expect(substitute(body, "x", mkVar("z"), new ReductionContext()))
      .to.equal(body);
  });

  it("does not substitute under a binder of the same name", () => {
    const body = term("fn x => x");
    expect(substitute(body, "x", mkVar("z"), new ReductionContext()))
      .to.equal(body);
  });

  it("renames an inner binder that clashes with a fresh name", () => {
    const result = substitute(
      term("fn y => fn y0 => x y"),
      "x",
      mkVar("y"),
      new ReductionContext(),
    );
    expect(prettyPrintUntypedLambda(result)).to.equal(
      "fn y0 => fn y1 => y y0",
    );
  });

  it("renames a binder that would capture the argument", () => {
    const result = substitute(
      term("fn y => x"),
      "x",
      mkVar("y"),
      new ReductionContext(),
    );
    expect(result).to.deep.equal(mkUntypedAbs("y0", mkVar("y")));
    expect(prettyPrintUntypedLambda(result)).to.equal("fn y0 => y");
    expect(alphaEquivalent(result, term("fn y => y"))).to.equal(false);
  });

  it("preserves names that are free in the argument", () => {
    const result = substitute(
      term("fn x => y"),
      "y",
      term("fn z => x"),
      new ReductionContext(),
    );
    expect(alphaEquivalent(result, term("fn z => fn y => x"))).to.equal(true);
  });

  it("keeps the binder when the argument cannot be captured", () => {
    const result = substitute(
      term("fn y => x y"),
      "x",
      term("fn z => z"),
      new ReductionContext(),
    );
    expect(prettyPrintUntypedLambda(result)).to.equal("fn y => (fn z => z) y");
  });

  it("picks a fresh name clear of the body's free variables", () => {
    const result = substitute(
      term("fn y => x y0"),
      "x",
      mkVar("y"),
      new ReductionContext(),
    );
    expect(prettyPrintUntypedLambda(result)).to.equal("fn y1 => y y0");
  });

  it("returns the body itself when the parameter does not occur", () => {
    const body = term("fn x => y");
    expect(substitute(body, "z", term("x y"), new ReductionContext()))
      .to.equal(body);
  });
});
