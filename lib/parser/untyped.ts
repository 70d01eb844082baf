import {
  createApplication,
  mkUntypedAbs,
  mkVar,
  type UntypedLambda,
} from "../terms/lambda.js";
import {
  matchLP,
  matchRP,
  matchToken,
  parseIdentifier,
  type ParserState,
  peek,
  scanIdentifier,
  skipWhitespace,
} from "./parserState.js";
import { parseChain } from "./chain.js";
import { parseWithEOF } from "./eof.js";
import { FAT_ARROW, FN, LEFT_PAREN } from "./consts.js";

/**
 * Parses an untyped lambda term (including applications) by chaining
 * together atomic terms.
 *
 * Returns a triple: [literal, UntypedLambda, updatedState]
 */
export function parseUntypedLambdaInternal(
  state: ParserState,
): [string, UntypedLambda, ParserState] {
  return parseChain<UntypedLambda>(
    state,
    parseAtomicUntypedLambda,
    createApplication,
  );
}

/**
 * Parses an atomic untyped lambda term, tracking the literal substring precisely.
 *
 * An abstraction body extends as far to the right as possible, so
 * `fn x => x y` is `fn x => (x y)`.
 */
export function parseAtomicUntypedLambda(
  state: ParserState,
): [string, UntypedLambda, ParserState] {
  const s = skipWhitespace(state);
  const [word, afterWord] = scanIdentifier(s);

  if (word === FN) {
    const [param, stateAfterParam] = parseIdentifier(afterWord);
    const stateAfterArrow = matchToken(stateAfterParam, FAT_ARROW);
    const [, bodyTerm, stateAfterBody] = parseUntypedLambdaInternal(
      stateAfterArrow,
    );
    const literal = s.buf.slice(s.idx, stateAfterBody.idx);
    return [literal, mkUntypedAbs(param, bodyTerm), stateAfterBody];
  }

  const [peeked] = peek(s);
  if (peeked === LEFT_PAREN) {
    const stateAfterLP = matchLP(s);
    const [, innerTerm, stateAfterInner] = parseUntypedLambdaInternal(
      stateAfterLP,
    );
    const stateAfterRP = matchRP(stateAfterInner);
    return [s.buf.slice(s.idx, stateAfterRP.idx), innerTerm, stateAfterRP];
  }

  const [varLit, stateAfterVar] = parseIdentifier(s);
  return [varLit, mkVar(varLit), stateAfterVar];
}

/**
 * Parses an input string into an untyped lambda term.
 *
 * This function delegates to parseWithEOF, which ensures that all input
 * is consumed by the parser.
 */
export function parseLambda(input: string): [string, UntypedLambda] {
  const [lit, term] = parseWithEOF(input, parseUntypedLambdaInternal);
  return [lit, term];
}
