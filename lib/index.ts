/**
 * fnlc: parsing, unrolling, normal-order reduction, alpha-equivalence and
 * printing for the `fn x => body` lambda calculus.
 *
 * This module re-exports the public API:
 * - term and program ASTs with their printers
 * - the term and program parsers
 * - the unroller that turns a program into one term
 * - the normal-order evaluator and capture-avoiding substitution
 * - alpha-equivalence and the Church-encoding value classifier
 *
 * @example
 * ```ts
 * import { normalize, parseProgram, prettyPrintUntypedLambda, unroll } from "fnlc";
 *
 * const program = parseProgram("id := fn x => x; main := id id;");
 * console.log(prettyPrintUntypedLambda(normalize(unroll(program)))); // "fn x => x"
 * ```
 *
 * @module
 */

// Terms
export {
  abstractAll,
  createApplication,
  type LambdaVar,
  mkUntypedAbs,
  mkVar,
  /** Prints a term in surface syntax with minimal parentheses. */
  prettyPrintUntypedLambda,
  termSize,
  typelessApp,
  type UntypedApplication,
  type UntypedLambda,
  type UntypedLambdaAbs,
} from "./terms/lambda.js";
export {
  type Definition,
  MAIN,
  mkDefinition,
  mkProgram,
  type Program,
} from "./terms/program.js";
export { alphaEquivalent } from "./terms/alphaEquivalence.js";
export { randLambda, type RandomSource } from "./terms/generator.js";

// Parser
/** Parses a single term. */
export { parseLambda } from "./parser/untyped.js";
/** Parses a whole source file. */
export { parseProgram } from "./parser/program.js";
export { ParseError, type SourceLocation } from "./parser/parseError.js";

// Unrolling and printing
export {
  unboundReferences,
  unroll,
  type UnrollOptions,
} from "./meta/unroll.js";
export { UnboundReferenceError } from "./meta/errors.js";
export { unparseDefinition, unparseProgram } from "./meta/unparse.js";

// Evaluation
export type { Evaluator, Result } from "./evaluator/evaluator.js";
export {
  contract,
  normalize,
  normalOrderEvaluator,
  reductionSteps,
  stepOnce,
  whnf,
} from "./evaluator/normalOrder.js";
export { substitute } from "./evaluator/substitution.js";
export {
  freeVariables,
  isClosed,
  isFreeIn,
} from "./evaluator/freeVariables.js";
export { FreshNameSupply } from "./evaluator/freshNames.js";
export {
  ReductionContext,
  type ReductionOptions,
  StepLimitExceededError,
} from "./evaluator/reductionContext.js";

// Encodings
export {
  churchNumeral,
  mult,
  MULT,
  plus,
  PLUS,
  succ,
  SUCC,
  unChurchNumeral,
} from "./data/church.js";
export {
  and,
  AND,
  churchBoolean,
  FALSE,
  not,
  NOT,
  or,
  OR,
  TRUE,
  unChurchBoolean,
} from "./data/bool.js";
export {
  classify,
  classifyAll,
  describeValue,
  type ValueTag,
} from "./data/classify.js";

// CLI
export { main } from "./cli/main.js";
export { formatMatches, type Reporter, runSource } from "./cli/run.js";
export {
  type CliOptions,
  CliUsageError,
  parseArgs,
  USAGE,
} from "./cli/options.js";
export { VERSION } from "./shared/version.js";
