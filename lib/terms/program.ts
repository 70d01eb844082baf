/**
 * Whole programs: an ordered list of named definitions followed by the
 * `main` term.
 *
 * @module
 */
import type { UntypedLambda } from "./lambda.js";

/** The name under which the main term is written in source. */
export const MAIN = "main" as const;

/**
 * A named top-level term, e.g. `id := fn x => x`.
 */
export interface Definition {
  readonly name: string;
  readonly term: UntypedLambda;
}

/**
 * A parsed source file. Definition order is significant: a later
 * definition of a name shadows an earlier one.
 */
export interface Program {
  readonly definitions: readonly Definition[];
  readonly main: UntypedLambda;
}

export const mkDefinition = (
  name: string,
  term: UntypedLambda,
): Definition => ({ name, term });

export const mkProgram = (
  definitions: readonly Definition[],
  main: UntypedLambda,
): Program => ({ definitions, main });
