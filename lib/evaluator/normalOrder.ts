/**
 * Normal-order (leftmost-outermost) beta reduction.
 *
 * Reduction goes under binders, so the result is a full beta-normal form.
 * None of these functions terminate on a term without a normal form unless
 * the ReductionContext carries a step budget.
 *
 * @module
 */
import {
  createApplication,
  mkUntypedAbs,
  type UntypedApplication,
  type UntypedLambda,
  type UntypedLambdaAbs,
} from "../terms/lambda.js";
import type { Evaluator, Result } from "./evaluator.js";
import { ReductionContext } from "./reductionContext.js";
import { substitute } from "./substitution.js";

/**
 * Contracts the redex `(fn x => body) argument`.
 */
export function contract(
  abs: UntypedLambdaAbs,
  argument: UntypedLambda,
  context: ReductionContext,
): UntypedLambda {
  context.recordStep();
  return substitute(abs.body, abs.name, argument, context);
}

/**
 * Reduces the head of a term until it is an abstraction or a variable
 * applied to arguments (weak head normal form). Arguments and abstraction
 * bodies are left alone. A term that is already in weak head normal form is
 * returned as it is.
 */
export function whnf(
  term: UntypedLambda,
  context: ReductionContext,
): UntypedLambda {
  // arguments of the spine, the innermost (first applied) on top
  const args: UntypedLambda[] = [];
  let head = term;
  let contracted = false;
  for (;;) {
    if (head.kind === "non-terminal") {
      args.push(head.rgt);
      head = head.lft;
      continue;
    }
    const argument = head.kind === "lambda-abs" ? args.pop() : undefined;
    if (head.kind !== "lambda-abs" || argument === undefined) break;
    head = contract(head, argument, context);
    contracted = true;
  }
  if (!contracted) return term;
  for (let i = args.length - 1; i >= 0; i--) {
    head = createApplication(head, args[i]);
  }
  return head;
}

// work left over once the subterm being normalized reaches its normal form
type Continuation =
  | { readonly kind: "binder"; readonly name: string }
  | {
    readonly kind: "argument";
    readonly applied: UntypedLambda;
    readonly args: readonly UntypedLambda[];
    readonly index: number;
  };

/**
 * Reduces a term to beta-normal form.
 *
 * The head is brought to weak head normal form first. An abstraction is then
 * normalized under its binder; a variable's arguments are normalized left to
 * right. Pending work is kept on an explicit stack, so deep terms do not
 * exhaust the call stack.
 *
 * NOTE: this function is not guaranteed to terminate
 */
export function normalize(
  term: UntypedLambda,
  context: ReductionContext = new ReductionContext(),
): UntypedLambda {
  const continuations: Continuation[] = [];
  let current = term;
  for (;;) {
    let value = whnf(current, context);
    if (value.kind === "lambda-abs") {
      continuations.push({ kind: "binder", name: value.name });
      current = value.body;
      continue;
    }

    // x a1 ... an: collect the arguments in application order
    const args: UntypedLambda[] = [];
    while (value.kind === "non-terminal") {
      args.push(value.rgt);
      value = value.lft;
    }
    args.reverse();
    if (args.length > 0) {
      continuations.push({ kind: "argument", applied: value, args, index: 0 });
      current = args[0];
      continue;
    }

    let next: UntypedLambda | undefined;
    while (next === undefined) {
      const k = continuations.pop();
      if (k === undefined) return value;
      if (k.kind === "binder") {
        value = mkUntypedAbs(k.name, value);
        continue;
      }
      const applied = createApplication(k.applied, value);
      const index = k.index + 1;
      if (index < k.args.length) {
        continuations.push({ ...k, applied, index });
        next = k.args[index];
      } else {
        value = applied;
      }
    }
    current = next;
  }
}

// a position on the way down to a redex
type Crumb =
  | {
    readonly kind: "body";
    readonly node: UntypedLambdaAbs;
    readonly parent: Crumb | undefined;
  }
  | {
    readonly kind: "lft" | "rgt";
    readonly node: UntypedApplication;
    readonly parent: Crumb | undefined;
  };

function rebuild(
  crumb: Crumb | undefined,
  replacement: UntypedLambda,
): UntypedLambda {
  let current = replacement;
  for (let c = crumb; c !== undefined; c = c.parent) {
    switch (c.kind) {
      case "body":
        current = mkUntypedAbs(c.node.name, current);
        break;
      case "lft":
        current = createApplication(current, c.node.rgt);
        break;
      case "rgt":
        current = createApplication(c.node.lft, current);
        break;
    }
  }
  return current;
}

// finds the leftmost-outermost redex by a pre-order walk and contracts it
function step(
  term: UntypedLambda,
  context: ReductionContext,
): UntypedLambda | undefined {
  const pending: { node: UntypedLambda; crumb: Crumb | undefined }[] = [
    { node: term, crumb: undefined },
  ];
  for (let item = pending.pop(); item !== undefined; item = pending.pop()) {
    const { node, crumb } = item;
    switch (node.kind) {
      case "lambda-var":
        break;
      case "lambda-abs":
        pending.push({
          node: node.body,
          crumb: { kind: "body", node, parent: crumb },
        });
        break;
      case "non-terminal":
        if (node.lft.kind === "lambda-abs") {
          return rebuild(crumb, contract(node.lft, node.rgt, context));
        }
        pending.push(
          { node: node.rgt, crumb: { kind: "rgt", node, parent: crumb } },
          { node: node.lft, crumb: { kind: "lft", node, parent: crumb } },
        );
        break;
    }
  }
  return undefined;
}

/**
 * Contracts the leftmost-outermost redex of a term.
 * @returns the evaluation result after one step; `altered` is false when the
 * term is already in normal form.
 */
export function stepOnce(
  term: UntypedLambda,
  context: ReductionContext = new ReductionContext(),
): Result<UntypedLambda> {
  const next = step(term, context);
  return next === undefined
    ? { altered: false, expr: term }
    : { altered: true, expr: next };
}

/**
 * Lazily yields the term after each reduction step. The last value yielded
 * is the normal form, which is also the generator's return value; nothing is
 * yielded for a term that is already normal. For a term without a normal
 * form the sequence never ends, and the consumer stops by no longer pulling.
 */
export function* reductionSteps(
  term: UntypedLambda,
  context: ReductionContext = new ReductionContext(),
): Generator<UntypedLambda, UntypedLambda, undefined> {
  let current = term;
  for (;;) {
    const result = stepOnce(current, context);
    if (!result.altered) return current;
    current = result.expr;
    yield current;
  }
}

export const normalOrderEvaluator: Evaluator<UntypedLambda> = {
  stepOnce: (expr) => stepOnce(expr),

  reduce(expr, maxIterations) {
    if (maxIterations === undefined) return normalize(expr);
    const context = new ReductionContext();
    let current = expr;
    for (let i = 0; i < maxIterations; i++) {
      const result = stepOnce(current, context);
      if (!result.altered) break;
      current = result.expr;
    }
    return current;
  },
};
