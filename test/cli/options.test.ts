import { describe, it } from "mocha";
import { assert, expect } from "chai";

import { CliUsageError, parseArgs } from "../../lib/cli/options.js";

describe("parseArgs", () => {
  it("defaults every flag to off", () => {
    expect(parseArgs(["prog.fnlc"])).to.deep.equal({
      help: false,
      version: false,
      verbose: false,
      strict: false,
      inputPath: "prog.fnlc",
    });
  });

  it("reads short and long flags", () => {
    const options = parseArgs(["-V", "--strict", "prog.fnlc", "-h", "-v"]);
    expect(options.verbose).to.equal(true);
    expect(options.strict).to.equal(true);
    expect(options.help).to.equal(true);
    expect(options.version).to.equal(true);
  });

  it("reads a step budget in either form", () => {
    expect(parseArgs(["--max-steps", "50", "p"]).maxSteps).to.equal(50);
    expect(parseArgs(["--max-steps=7", "p"]).maxSteps).to.equal(7);
  });

  it("rejects a bad step budget", () => {
    assert.throws(
      () => parseArgs(["--max-steps", "-3"]),
      CliUsageError,
      "--max-steps expects a non-negative integer, got '-3'",
    );
    assert.throws(
      () => parseArgs(["--max-steps"]),
      CliUsageError,
      "--max-steps needs a value",
    );
  });

  it("rejects unknown options", () => {
    assert.throws(
      () => parseArgs(["--bogus"]),
      CliUsageError,
      "Unknown option: --bogus",
    );
  });

  it("rejects a second input file", () => {
    assert.throws(
      () => parseArgs(["a.fnlc", "b.fnlc"]),
      CliUsageError,
      "Too many arguments",
    );
  });
});
