/**
 * Unparsing utilities for definitions and whole programs.
 *
 * @module
 */
import { prettyPrintUntypedLambda } from "../terms/lambda.js";
import { MAIN, type Definition, type Program } from "../terms/program.js";

const def = " := ";

export function unparseDefinition(dt: Definition): string {
  return dt.name + def + prettyPrintUntypedLambda(dt.term);
}

/**
 * Prints one `name := term;` line per definition, then the main term.
 * The output parses back to an equal program.
 */
export function unparseProgram(program: Program): string {
  return [
    ...program.definitions.map((d) => `${unparseDefinition(d)};`),
    `${MAIN}${def}${prettyPrintUntypedLambda(program.main)};`,
  ].join("\n");
}
