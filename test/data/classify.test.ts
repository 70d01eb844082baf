import { describe, it } from "mocha";
import { expect } from "chai";

import {
  classify,
  classifyAll,
  describeValue,
} from "../../lib/data/classify.js";
import { churchNumeral } from "../../lib/data/church.js";
import { TRUE } from "../../lib/data/bool.js";
import { term } from "../util/terms.js";

describe("classify", () => {
  it("recognises numerals", () => {
    expect(classifyAll(churchNumeral(4))).to.deep.equal([
      { kind: "numeral", value: 4 },
    ]);
  });

  it("recognises booleans", () => {
    expect(classifyAll(TRUE)).to.deep.equal([{ kind: "boolean", value: true }]);
  });

  it("reports both readings of zero", () => {
    expect(classifyAll(term("fn a => fn b => b"))).to.deep.equal([
      { kind: "numeral", value: 0 },
      { kind: "boolean", value: false },
    ]);
    expect(classify(term("fn a => fn b => b"))).to.deep.equal({
      kind: "numeral",
      value: 0,
    });
  });

  it("returns nothing for other terms", () => {
    expect(classifyAll(term("fn x => x"))).to.deep.equal([]);
    expect(classify(term("x y"))).to.equal(undefined);
  });

  it("describes tags", () => {
    expect(describeValue({ kind: "numeral", value: 1 })).to.equal(
      "Church numeral 1",
    );
    expect(describeValue({ kind: "boolean", value: false })).to.equal(
      "boolean false",
    );
  });
});
