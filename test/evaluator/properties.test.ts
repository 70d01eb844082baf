import { describe, it } from "mocha";
import { expect } from "chai";
import rsexport from "random-seed";

import { normalize, stepOnce } from "../../lib/evaluator/normalOrder.js";
import {
  ReductionContext,
  StepLimitExceededError,
} from "../../lib/evaluator/reductionContext.js";
import { alphaEquivalent } from "../../lib/terms/alphaEquivalence.js";
import { randLambda } from "../../lib/terms/generator.js";
import type { UntypedLambda } from "../../lib/terms/lambda.js";

const { create } = rsexport;

const STEP_BUDGET = 2000;

// random terms may diverge; those are skipped
function normalizeWithin(t: UntypedLambda): UntypedLambda | undefined {
  try {
    return normalize(t, new ReductionContext({ maxSteps: STEP_BUDGET }));
  } catch (err) {
    if (err instanceof StepLimitExceededError) return undefined;
    throw err;
  }
}

describe("normal forms of random terms", () => {
  const normals: UntypedLambda[] = [];
  for (let seed = 0; seed < 60; seed++) {
    const normal = normalizeWithin(randLambda(create(`normal-${seed}`), 14));
    if (normal !== undefined) normals.push(normal);
  }

  it("normalizes most samples within the budget", () => {
    expect(normals.length).to.be.greaterThan(30);
  });

  it("contain no redex", () => {
    for (const normal of normals) {
      expect(stepOnce(normal).altered).to.equal(false);
    }
  });

  it("are fixed points of normalize", () => {
    for (const normal of normals) {
      expect(alphaEquivalent(normalize(normal), normal)).to.equal(true);
    }
  });
});
