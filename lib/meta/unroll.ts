/**
 * Desugars a program into a single lambda term.
 *
 * There is no primitive let, so each definition becomes an abstraction over
 * its name applied to its value:
 *
 * ```
 * foo := term1;
 * bar := term2;
 * main := term3;
 * ```
 *
 * unrolls into
 *
 * ```
 * (fn foo => (fn bar => term3) term2) term1
 * ```
 *
 * @module
 */
import {
  createApplication,
  mkUntypedAbs,
  type UntypedLambda,
} from "../terms/lambda.js";
import type { Program } from "../terms/program.js";
import { freeVariables } from "../evaluator/freeVariables.js";
import { UnboundReferenceError } from "./errors.js";

export interface UnrollOptions {
  /**
   * Reject programs whose unrolled term has free variables. When off (the
   * default) such names stay free and reduction treats them as opaque.
   */
  strict?: boolean;
}

/**
 * Names used but bound neither by a definition nor by an abstraction,
 * sorted.
 */
export function unboundReferences(term: UntypedLambda): string[] {
  return [...freeVariables(term)].sort();
}

/**
 * Wraps `main` in one abstraction/application pair per definition, working
 * from the last definition to the first so that the first definition ends
 * up outermost. A later definition of a name therefore shadows an earlier
 * one inside `main`.
 *
 * @throws UnboundReferenceError in strict mode when the result is open.
 */
export function unroll(
  program: Program,
  options: UnrollOptions = {},
): UntypedLambda {
  const term = program.definitions.reduceRight<UntypedLambda>(
    (acc, definition) =>
      createApplication(mkUntypedAbs(definition.name, acc), definition.term),
    program.main,
  );

  if (options.strict) {
    const unbound = unboundReferences(term);
    if (unbound.length > 0) {
      throw new UnboundReferenceError(unbound);
    }
  }
  return term;
}
