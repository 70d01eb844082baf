/**
 * Evaluator interface for lambda terms.
 *
 * This module defines the interface for evaluators, providing both
 * single-step and full reduction operations.
 *
 * @module
 */

/**
 * the shape of an evaluation result.
 * altered is set if the evaluation step changed the input.
 * expr is the evaluation output.
 */
export interface Result<E> {
  altered: boolean;
  expr: E;
}

export interface Evaluator<E> {
  /** Apply exactly one β-step (or return unchanged). */
  stepOnce(expr: E): Result<E>;

  /** Keep stepping until fix-point or maxIterations. */
  reduce(expr: E, maxIterations?: number): E;
}
