import { describe, it } from "mocha";
import { expect } from "chai";

import { FreshNameSupply } from "../../lib/evaluator/freshNames.js";

describe("FreshNameSupply", () => {
  it("numbers names per stem, starting from zero", () => {
    const supply = new FreshNameSupply();
    expect(supply.fresh("y", () => false)).to.equal("y0");
    expect(supply.fresh("y", () => false)).to.equal("y1");
    expect(supply.fresh("x", () => false)).to.equal("x0");
  });

  it("shares a counter between names that differ only in trailing digits", () => {
    const supply = new FreshNameSupply();
    expect(supply.fresh("y", () => false)).to.equal("y0");
    expect(supply.fresh("y12", () => false)).to.equal("y1");
  });

  it("skips candidates that are taken", () => {
    const supply = new FreshNameSupply();
    const taken = new Set(["x0", "x1"]);
    expect(supply.fresh("x", (n) => taken.has(n))).to.equal("x2");
    expect(supply.fresh("x", () => false)).to.equal("x3");
  });

  it("never repeats a name", () => {
    const supply = new FreshNameSupply();
    const bases = ["hello", "goodbye", "foo", "bar", "foo", "goodbye", "x", "x1"];
    const seen = new Set<string>();
    for (let i = 0; i < 100; i++) {
      const name = supply.fresh(bases[i % bases.length], () => false);
      expect(seen.has(name)).to.equal(false);
      seen.add(name);
    }
  });

  it("keeps separate supplies independent", () => {
    const first = new FreshNameSupply();
    const second = new FreshNameSupply();
    first.fresh("z", () => false);
    expect(second.fresh("z", () => false)).to.equal("z0");
  });

  it("falls back to bare numbers for all-digit names", () => {
    expect(new FreshNameSupply().fresh("42", () => false)).to.equal("0");
  });
});
