/**
 * Binary cons cells.
 *
 * Applications are the only branching node of a lambda term; they are stored
 * as cons cells whose left branch is the function and whose right branch is
 * the argument.
 *
 * @example
 * ```ts
 * import { cons } from "./cons.js";
 * import { mkVar } from "./terms/lambda.js";
 *
 * const fx = cons(mkVar("f"), mkVar("x")); // f x
 * ```
 *
 * @module
 */

export interface ConsCell<E> {
  readonly kind: "non-terminal";
  readonly lft: E;
  readonly rgt: E;
}

/**
 * @param lft the left subtree.
 * @param rgt the right subtree.
 * @returns a new non-terminal node, with E as the type of each branch.
 */
export const cons = <E>(lft: E, rgt: E): ConsCell<E> => ({
  kind: "non-terminal",
  lft,
  rgt,
});
