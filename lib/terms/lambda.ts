/**
 * Untyped lambda calculus term representation.
 *
 * This module defines the AST for terms of the `fn x => body` calculus:
 * variables, abstractions, and applications. Terms are immutable trees;
 * every operation that changes a term builds a new one.
 *
 * @module
 */
import { type ConsCell, cons } from "../cons.js";

/**
 * This is a single term variable with a name.
 *
 * For instance, in the expression "fn x => y", this is just "y".
 */
export interface LambdaVar {
  readonly kind: "lambda-var";
  readonly name: string;
}

export const mkVar = (name: string): LambdaVar => ({
  kind: "lambda-var",
  name,
});

// fn x => <body>, where x is a name
export interface UntypedLambdaAbs {
  readonly kind: "lambda-abs";
  readonly name: string;
  readonly body: UntypedLambda;
}

export const mkUntypedAbs = (
  name: string,
  body: UntypedLambda,
): UntypedLambdaAbs => ({
  kind: "lambda-abs",
  name,
  body,
});

/**
 * An application in the untyped lambda calculus: `lft` is the function and
 * `rgt` the argument.
 */
export type UntypedApplication = ConsCell<UntypedLambda>;

/**
 * The legal terms of the untyped lambda calculus.
 * e ::= x | fn x => e | e e, where x is a variable name, and e is a valid expr
 */
export type UntypedLambda =
  | LambdaVar
  | UntypedLambdaAbs
  | UntypedApplication;

/**
 * Creates an application of one untyped lambda term to another.
 * @param left the function term
 * @param right the argument term
 * @returns a new application node
 */
export const createApplication = (
  left: UntypedLambda,
  right: UntypedLambda,
): UntypedApplication => cons<UntypedLambda>(left, right);

/**
 * Left-associated application of a head to its arguments, so
 * `typelessApp(f, a, b)` is `(f a) b`.
 */
export const typelessApp = (
  head: UntypedLambda,
  ...args: UntypedLambda[]
): UntypedLambda => args.reduce<UntypedLambda>(createApplication, head);

/**
 * Nests abstractions, so `abstractAll(["f", "x"], body)` is
 * `fn f => fn x => body`.
 */
export const abstractAll = (
  names: readonly string[],
  body: UntypedLambda,
): UntypedLambda =>
  names.reduceRight<UntypedLambda>(
    (acc, name) => mkUntypedAbs(name, acc),
    body,
  );

/**
 * Counts the nodes of a term.
 */
export function termSize(term: UntypedLambda): number {
  let size = 0;
  const pending: UntypedLambda[] = [term];
  for (let node = pending.pop(); node !== undefined; node = pending.pop()) {
    size++;
    switch (node.kind) {
      case "lambda-var":
        break;
      case "lambda-abs":
        pending.push(node.body);
        break;
      case "non-terminal":
        pending.push(node.rgt, node.lft);
        break;
    }
  }
  return size;
}

/**
 * Prints a term in surface syntax with minimal parentheses: an abstraction in
 * function position, and an application or abstraction in argument position,
 * are parenthesized. Re-parsing the output yields the same term.
 *
 * @example
 * ```ts
 * prettyPrintUntypedLambda(
 *   typelessApp(mkUntypedAbs("x", mkVar("x")), mkVar("y"), mkVar("z")),
 * ); // "(fn x => x) y z"
 * ```
 */
export const prettyPrintUntypedLambda = (ut: UntypedLambda): string => {
  const out: string[] = [];
  // text and subterms still to print, the next one on top
  const pending: (UntypedLambda | string)[] = [ut];
  for (let item = pending.pop(); item !== undefined; item = pending.pop()) {
    if (typeof item === "string") {
      out.push(item);
      continue;
    }
    switch (item.kind) {
      case "lambda-var":
        out.push(item.name);
        break;
      case "lambda-abs":
        out.push(`fn ${item.name} => `);
        pending.push(item.body);
        break;
      case "non-terminal":
        if (item.rgt.kind === "lambda-var") {
          pending.push(item.rgt.name);
        } else {
          pending.push(")", item.rgt, "(");
        }
        pending.push(" ");
        if (item.lft.kind === "lambda-abs") {
          pending.push(")", item.lft, "(");
        } else {
          pending.push(item.lft);
        }
        break;
    }
  }
  return out.join("");
};
