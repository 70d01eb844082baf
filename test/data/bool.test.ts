import { describe, it } from "mocha";
import { expect } from "chai";

import {
  and,
  churchBoolean,
  FALSE,
  not,
  or,
  TRUE,
  unChurchBoolean,
} from "../../lib/data/bool.js";
import { alphaEquivalent } from "../../lib/terms/alphaEquivalence.js";
import { term } from "../util/terms.js";

describe("Church booleans", () => {
  const truthTable: [boolean, boolean][] = [
    [true, true],
    [true, false],
    [false, true],
    [false, false],
  ];

  for (const [a, b] of truthTable) {
    it(`${a} and ${b}`, () => {
      expect(unChurchBoolean(and(churchBoolean(a), churchBoolean(b))))
        .to.equal(a && b);
    });

    it(`${a} or ${b}`, () => {
      expect(unChurchBoolean(or(churchBoolean(a), churchBoolean(b))))
        .to.equal(a || b);
    });
  }

  it("negates", () => {
    expect(alphaEquivalent(not(TRUE), FALSE)).to.equal(true);
    expect(alphaEquivalent(not(FALSE), TRUE)).to.equal(true);
  });

  it("decodes up to renaming", () => {
    expect(unChurchBoolean(term("fn a => fn b => a"))).to.equal(true);
    expect(unChurchBoolean(term("fn a => fn b => b"))).to.equal(false);
    expect(unChurchBoolean(term("fn a => a"))).to.equal(undefined);
  });
});
