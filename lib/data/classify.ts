/**
 * Guesses which familiar value a normal form encodes.
 *
 * @module
 */
import type { UntypedLambda } from "../terms/lambda.js";
import { unChurchNumeral } from "./church.js";
import { unChurchBoolean } from "./bool.js";

export type ValueTag =
  | { kind: "numeral"; value: number }
  | { kind: "boolean"; value: boolean };

/**
 * Every encoding the term is alpha-equivalent to, numerals first. Zero and
 * false share a term, so both can match.
 */
export function classifyAll(term: UntypedLambda): ValueTag[] {
  const tags: ValueTag[] = [];
  const numeral = unChurchNumeral(term);
  if (numeral !== undefined) {
    tags.push({ kind: "numeral", value: numeral });
  }
  const bool = unChurchBoolean(term);
  if (bool !== undefined) {
    tags.push({ kind: "boolean", value: bool });
  }
  return tags;
}

export function classify(term: UntypedLambda): ValueTag | undefined {
  return classifyAll(term)[0];
}

export function describeValue(tag: ValueTag): string {
  switch (tag.kind) {
    case "numeral":
      return `Church numeral ${tag.value}`;
    case "boolean":
      return `boolean ${tag.value}`;
  }
}
