/**
 * Random lambda term generation.
 *
 * This module generates random terms of a given size from a seeded random
 * source, for reproducible property tests.
 *
 * @module
 */
import {
  createApplication,
  mkUntypedAbs,
  mkVar,
  type UntypedLambda,
} from "./lambda.js";

/**
 * Simple interface for random number generation.
 * This allows the generator to work with any random number source
 * without bundling specific dependencies.
 */
export interface RandomSource {
  /** Returns a random integer between min (inclusive) and max (inclusive) */
  intBetween(min: number, max: number): number;
}

const DEFAULT_NAMES = ["x", "y", "z"] as const;

const pick = (rs: RandomSource, names: readonly string[]): string =>
  names[rs.intBetween(0, names.length - 1)];

/**
 * @param rs the random source to use.
 * @param n the number of nodes in the generated term.
 * @param names the pool that binders and variables are drawn from; a small
 *   pool makes shadowing and capture likely.
 * @returns a random term with exactly n nodes, possibly open.
 */
export const randLambda = (
  rs: RandomSource,
  n: number,
  names: readonly string[] = DEFAULT_NAMES,
): UntypedLambda => {
  if (n <= 0) {
    throw new Error("A valid term must contain at least one node.");
  }
  if (names.length === 0) {
    throw new Error("At least one variable name is required.");
  }
  if (n === 1) {
    return mkVar(pick(rs, names));
  }
  // an application needs two children, so size 2 is always an abstraction
  if (n === 2 || rs.intBetween(0, 1) === 0) {
    return mkUntypedAbs(pick(rs, names), randLambda(rs, n - 1, names));
  }
  const leftSize = rs.intBetween(1, n - 2);
  return createApplication(
    randLambda(rs, leftSize, names),
    randLambda(rs, n - 1 - leftSize, names),
  );
};
