/**
 * Capture-avoiding substitution.
 *
 * [s/x] x           := s
 * [s/x] y           := y
 * [s/x] (fn x => t) := fn x => t
 * [s/x] (fn y => t) := fn y => [s/x] t              if y is not free in s
 * [s/x] (fn y => t) := fn z => [s/x] ([z/y] t)      otherwise, z fresh
 * [s/x] (t1 t2)     := ([s/x] t1) ([s/x] t2)
 *
 * Subtrees in which x is not free are returned as they are, so unchanged
 * parts of a term are shared between the input and the result.
 *
 * @module
 */
import {
  createApplication,
  mkUntypedAbs,
  mkVar,
  type UntypedLambda,
} from "../terms/lambda.js";
import { freeVariables } from "./freeVariables.js";
import type { ReductionContext } from "./reductionContext.js";

interface Job {
  readonly body: UntypedLambda;
  readonly param: string;
  readonly argument: UntypedLambda;
}

// what to do with the result of the job in progress
type Continuation =
  | { readonly kind: "argument"; readonly job: Job }
  | { readonly kind: "apply"; readonly lft: UntypedLambda }
  | { readonly kind: "binder"; readonly name: string }
  | {
    readonly kind: "renamed";
    readonly name: string;
    readonly param: string;
    readonly argument: UntypedLambda;
  };

/**
 * Replaces the free occurrences of `param` in `body` with `argument`,
 * renaming binders of `body` that would capture a free variable of
 * `argument`. Runs on an explicit stack, so the depth of `body` is not
 * limited by the call stack.
 */
export function substitute(
  body: UntypedLambda,
  param: string,
  argument: UntypedLambda,
  context: ReductionContext,
): UntypedLambda {
  const continuations: Continuation[] = [];
  let job: Job = { body, param, argument };

  for (;;) {
    const { body: node, param: x, argument: s } = job;
    let value: UntypedLambda;

    if (!freeVariables(node).has(x)) {
      value = node;
    } else if (node.kind === "lambda-var") {
      // free and a variable, so it is `x` itself
      value = s;
    } else if (node.kind === "non-terminal") {
      continuations.push({
        kind: "argument",
        job: { body: node.rgt, param: x, argument: s },
      });
      job = { body: node.lft, param: x, argument: s };
      continue;
    } else {
      const argumentFree = freeVariables(s);
      if (!argumentFree.has(node.name)) {
        continuations.push({ kind: "binder", name: node.name });
        job = { body: node.body, param: x, argument: s };
        continue;
      }

      const bodyFree = freeVariables(node.body);
      const renamed = context.names.fresh(
        node.name,
        (candidate) =>
          candidate === x ||
          argumentFree.has(candidate) ||
          bodyFree.has(candidate),
      );
      continuations.push({ kind: "renamed", name: renamed, param: x, argument: s });
      job = { body: node.body, param: node.name, argument: mkVar(renamed) };
      continue;
    }

    let next: Job | undefined;
    while (next === undefined) {
      const k = continuations.pop();
      if (k === undefined) return value;
      switch (k.kind) {
        case "argument":
          continuations.push({ kind: "apply", lft: value });
          next = k.job;
          break;
        case "apply":
          value = createApplication(k.lft, value);
          break;
        case "binder":
          value = mkUntypedAbs(k.name, value);
          break;
        case "renamed":
          // the binder is renamed in the body; now substitute into the result
          continuations.push({ kind: "binder", name: k.name });
          next = { body: value, param: k.param, argument: k.argument };
          break;
      }
    }
    job = next;
  }
}
