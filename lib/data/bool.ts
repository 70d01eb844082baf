/**
 * Church booleans: `true` picks the first of two arguments, `false` the
 * second.
 *
 * @module
 */
import { parseLambda } from "../parser/untyped.js";
import { typelessApp, type UntypedLambda } from "../terms/lambda.js";
import { alphaEquivalent } from "../terms/alphaEquivalence.js";
import { normalize } from "../evaluator/normalOrder.js";

export const [, TRUE] = parseLambda("fn t => fn e => t");
export const [, FALSE] = parseLambda("fn t => fn e => e");
export const [, AND] = parseLambda("fn a => fn b => a b (fn t => fn e => e)");
export const [, OR] = parseLambda("fn a => fn b => a (fn t => fn e => t) b");
export const [, NOT] = parseLambda(
  "fn p => p (fn t => fn e => e) (fn t => fn e => t)",
);

export const churchBoolean = (b: boolean): UntypedLambda => b ? TRUE : FALSE;

export function unChurchBoolean(term: UntypedLambda): boolean | undefined {
  if (alphaEquivalent(term, TRUE)) return true;
  if (alphaEquivalent(term, FALSE)) return false;
  return undefined;
}

export const and = (a: UntypedLambda, b: UntypedLambda): UntypedLambda =>
  normalize(typelessApp(AND, a, b));

export const or = (a: UntypedLambda, b: UntypedLambda): UntypedLambda =>
  normalize(typelessApp(OR, a, b));

export const not = (a: UntypedLambda): UntypedLambda =>
  normalize(typelessApp(NOT, a));
