/**
 * The `fnlc` pipeline: parse, unroll, reduce, print, and guess the value.
 *
 * @module
 */
import { parseProgram } from "../parser/program.js";
import { ParseError } from "../parser/parseError.js";
import { unroll } from "../meta/unroll.js";
import { UnboundReferenceError } from "../meta/errors.js";
import {
  ReductionContext,
  StepLimitExceededError,
} from "../evaluator/reductionContext.js";
import { normalize, reductionSteps } from "../evaluator/normalOrder.js";
import {
  prettyPrintUntypedLambda,
  type UntypedLambda,
} from "../terms/lambda.js";
import { classifyAll, describeValue, type ValueTag } from "../data/classify.js";
import type { CliOptions } from "./options.js";

/**
 * Where the CLI writes. The binary colours each channel; tests record them.
 */
export interface Reporter {
  /** The normal form. */
  result(text: string): void;
  /** One line of the verbose reduction trace. */
  trace(text: string): void;
  /** Supplementary information, such as the guessed value. */
  note(text: string): void;
  error(text: string): void;
}

export function formatMatches(tags: readonly ValueTag[]): string {
  if (tags.length === 1) return describeValue(tags[0]);
  return tags.map((tag) => `\n - ${describeValue(tag)}`).join("");
}

function reduceVerbosely(
  term: UntypedLambda,
  context: ReductionContext,
  reporter: Reporter,
): UntypedLambda {
  reporter.trace(prettyPrintUntypedLambda(term));
  const steps = reductionSteps(term, context);
  let next = steps.next();
  while (!next.done) {
    reporter.trace(`=> ${prettyPrintUntypedLambda(next.value)}`);
    next = steps.next();
  }
  return next.value;
}

/**
 * Runs a program's source text.
 * @returns the process exit code.
 */
export function runSource(
  source: string,
  options: Pick<CliOptions, "verbose" | "strict" | "maxSteps">,
  reporter: Reporter,
): number {
  try {
    const term = unroll(parseProgram(source), { strict: options.strict });
    const context = new ReductionContext({ maxSteps: options.maxSteps });
    const normal = options.verbose
      ? reduceVerbosely(term, context, reporter)
      : normalize(term, context);

    reporter.result(prettyPrintUntypedLambda(normal));

    const tags = classifyAll(normal);
    if (tags.length > 0) {
      reporter.note(`Alpha-equivalent to: ${formatMatches(tags)}`);
    }
    return 0;
  } catch (err) {
    if (
      err instanceof ParseError ||
      err instanceof UnboundReferenceError ||
      err instanceof StepLimitExceededError ||
      // input nested too deeply for the parser's recursion
      err instanceof RangeError
    ) {
      reporter.error(`${err.name}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
