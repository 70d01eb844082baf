/**
 * Church numerals.
 *
 * The numeral n is `fn f => fn x => f (f (... (f x)))` with n applications
 * of `f`.
 *
 * @module
 */
import { parseLambda } from "../parser/untyped.js";
import {
  abstractAll,
  createApplication,
  mkVar,
  typelessApp,
  type UntypedLambda,
} from "../terms/lambda.js";
import { alphaEquivalent } from "../terms/alphaEquivalence.js";
import { normalize } from "../evaluator/normalOrder.js";

export const [, SUCC] = parseLambda("fn n => fn f => fn x => f (n f x)");
export const [, PLUS] = parseLambda(
  "fn m => fn n => fn f => fn x => m f (n f x)",
);
export const [, MULT] = parseLambda("fn m => fn n => fn f => m (n f)");

/**
 * Builds the Church numeral for a non-negative integer.
 */
export function churchNumeral(n: number): UntypedLambda {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new RangeError(`Church numerals encode non-negative integers, got ${n}`);
  }
  let body: UntypedLambda = mkVar("x");
  for (let i = 0; i < n; i++) {
    body = createApplication(mkVar("f"), body);
  }
  return abstractAll(["f", "x"], body);
}

/**
 * Reads a term back as a number if it is alpha-equivalent to a Church
 * numeral. The term is not reduced first.
 */
export function unChurchNumeral(term: UntypedLambda): number | undefined {
  if (term.kind !== "lambda-abs" || term.body.kind !== "lambda-abs") {
    return undefined;
  }
  // count the spine f (f (... x)), then confirm against the canonical numeral
  let n = 0;
  let current = term.body.body;
  while (current.kind === "non-terminal") {
    n++;
    current = current.rgt;
  }
  return alphaEquivalent(term, churchNumeral(n)) ? n : undefined;
}

/** The normal form of `SUCC n`. */
export const succ = (n: UntypedLambda): UntypedLambda =>
  normalize(createApplication(SUCC, n));

/** The normal form of `PLUS m n`. */
export const plus = (m: UntypedLambda, n: UntypedLambda): UntypedLambda =>
  normalize(typelessApp(PLUS, m, n));

/** The normal form of `MULT m n`. */
export const mult = (m: UntypedLambda, n: UntypedLambda): UntypedLambda =>
  normalize(typelessApp(MULT, m, n));
