/**
 * Alpha-equivalence of lambda terms.
 *
 * Both terms are walked together. Each pair of corresponding binders is
 * recorded at the same depth in two scope maps, so two variables match when
 * they resolve to binders at the same depth, or when both are free and carry
 * the same name. No reduction is performed.
 *
 * @module
 */
import type { UntypedLambda } from "./lambda.js";

type Scope = Map<string, number>;

type Task =
  | {
    readonly kind: "compare";
    readonly a: UntypedLambda;
    readonly b: UntypedLambda;
    readonly depth: number;
  }
  | {
    readonly kind: "unbind";
    readonly leftName: string;
    readonly leftPrevious: number | undefined;
    readonly rightName: string;
    readonly rightPrevious: number | undefined;
  };

function rebind(scope: Scope, name: string, previous: number | undefined) {
  if (previous === undefined) {
    scope.delete(name);
  } else {
    scope.set(name, previous);
  }
}

function equivalentUnder(
  a: UntypedLambda,
  b: UntypedLambda,
  freeNames: ReadonlyMap<string, string> | undefined,
): boolean {
  const left: Scope = new Map();
  const right: Scope = new Map();
  // an unbind task is pushed below its body's comparison, so it runs once
  // the whole body has been compared
  const tasks: Task[] = [{ kind: "compare", a, b, depth: 0 }];

  for (let task = tasks.pop(); task !== undefined; task = tasks.pop()) {
    if (task.kind === "unbind") {
      rebind(left, task.leftName, task.leftPrevious);
      rebind(right, task.rightName, task.rightPrevious);
      continue;
    }

    const { a: lhs, b: rhs, depth } = task;
    switch (lhs.kind) {
      case "lambda-var": {
        if (rhs.kind !== "lambda-var") return false;
        const leftBinder = left.get(lhs.name);
        const rightBinder = right.get(rhs.name);
        if (leftBinder === undefined && rightBinder === undefined) {
          if ((freeNames?.get(lhs.name) ?? lhs.name) !== rhs.name) return false;
        } else if (leftBinder !== rightBinder) {
          return false;
        }
        break;
      }
      case "lambda-abs":
        if (rhs.kind !== "lambda-abs") return false;
        tasks.push({
          kind: "unbind",
          leftName: lhs.name,
          leftPrevious: left.get(lhs.name),
          rightName: rhs.name,
          rightPrevious: right.get(rhs.name),
        });
        left.set(lhs.name, depth);
        right.set(rhs.name, depth);
        tasks.push({ kind: "compare", a: lhs.body, b: rhs.body, depth: depth + 1 });
        break;
      case "non-terminal":
        if (rhs.kind !== "non-terminal") return false;
        tasks.push({ kind: "compare", a: lhs.rgt, b: rhs.rgt, depth });
        tasks.push({ kind: "compare", a: lhs.lft, b: rhs.lft, depth });
        break;
    }
  }
  return true;
}

/**
 * Decides whether two terms are equal up to consistent renaming of bound
 * variables.
 *
 * @param freeNames optional correspondence for free variables of `a`: a
 *   free `x` in `a` matches a free `freeNames.get(x)` in `b`. Free names
 *   without an entry must be identical.
 */
export function alphaEquivalent(
  a: UntypedLambda,
  b: UntypedLambda,
  freeNames?: ReadonlyMap<string, string>,
): boolean {
  return equivalentUnder(a, b, freeNames);
}
