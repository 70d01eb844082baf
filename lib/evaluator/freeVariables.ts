/**
 * Free-variable sets of lambda terms.
 *
 * Terms are immutable, so the set computed for a node stays valid for the
 * node's lifetime and is memoised in a WeakMap. Substitution asks for these
 * sets on every binder it crosses; with the memo each node is scanned once.
 *
 * @module
 */
import type { UntypedLambda } from "../terms/lambda.js";

const memo = new WeakMap<UntypedLambda, ReadonlySet<string>>();

const EMPTY: ReadonlySet<string> = new Set<string>();

function union(
  lft: ReadonlySet<string>,
  rgt: ReadonlySet<string>,
): ReadonlySet<string> {
  if (rgt.size === 0) return lft;
  if (lft.size === 0) return rgt;
  const [small, large] = lft.size < rgt.size ? [lft, rgt] : [rgt, lft];
  let covered = true;
  for (const name of small) {
    if (!large.has(name)) {
      covered = false;
      break;
    }
  }
  if (covered) return large;
  const merged = new Set(large);
  for (const name of small) merged.add(name);
  return merged;
}

function withoutName(
  names: ReadonlySet<string>,
  name: string,
): ReadonlySet<string> {
  if (!names.has(name)) return names;
  const rest = new Set(names);
  rest.delete(name);
  return rest.size === 0 ? EMPTY : rest;
}

/**
 * Computes the names occurring free in a term.
 *
 * Subterms are visited from an explicit stack, children before parents, so
 * deeply nested applications do not exhaust the call stack.
 */
export function freeVariables(term: UntypedLambda): ReadonlySet<string> {
  const cached = memo.get(term);
  if (cached !== undefined) return cached;

  let result: ReadonlySet<string> = EMPTY;
  const settle = (node: UntypedLambda, names: ReadonlySet<string>) => {
    memo.set(node, names);
    result = names;
  };

  const pending: UntypedLambda[] = [term];
  while (pending.length > 0) {
    const node = pending[pending.length - 1];
    if (memo.has(node)) {
      pending.pop();
      continue;
    }
    switch (node.kind) {
      case "lambda-var":
        pending.pop();
        settle(node, new Set([node.name]));
        break;
      case "lambda-abs": {
        const inner = memo.get(node.body);
        if (inner === undefined) {
          pending.push(node.body);
        } else {
          pending.pop();
          settle(node, withoutName(inner, node.name));
        }
        break;
      }
      case "non-terminal": {
        const lft = memo.get(node.lft);
        const rgt = memo.get(node.rgt);
        if (lft !== undefined && rgt !== undefined) {
          pending.pop();
          settle(node, union(lft, rgt));
        } else {
          if (rgt === undefined) pending.push(node.rgt);
          if (lft === undefined) pending.push(node.lft);
        }
        break;
      }
    }
  }

  // the input sits at the bottom of the stack, so it is settled last
  return result;
}

export const isFreeIn = (name: string, term: UntypedLambda): boolean =>
  freeVariables(term).has(name);

export const isClosed = (term: UntypedLambda): boolean =>
  freeVariables(term).size === 0;
