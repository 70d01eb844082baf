import {
  errorAt,
  describeNext,
  isAtDefinitionStart,
  type ParserState,
  peek,
  skipWhitespace,
} from "./parserState.js";
import { RIGHT_PAREN, SEMICOLON } from "./consts.js";

/**
 * Parses a chain of juxtaposed atoms (applications), associating to the left.
 * Atoms are consumed until the input is exhausted, a closing ')' or ';' is
 * reached, or the next definition (`name :=`) begins.
 *
 * @param state the current parser state.
 * @param parseAtomic a function that parses an atomic term from the state,
 *   returning a triple: [literal, term, updatedState].
 * @param combine joins the chain so far with the next atom.
 * @returns a triple: [source literal, chained term, updated parser state].
 * @throws ParseError if no term is parsed.
 */
export function parseChain<T>(
  state: ParserState,
  parseAtomic: (state: ParserState) => [string, T, ParserState],
  combine: (lft: T, rgt: T) => T,
): [string, T, ParserState] {
  let resultTerm: T | undefined = undefined;
  const start = skipWhitespace(state);
  let currentState = start;

  for (;;) {
    const [peeked] = peek(currentState);
    if (peeked === null || peeked === RIGHT_PAREN || peeked === SEMICOLON) {
      break;
    }
    if (isAtDefinitionStart(currentState)) {
      break;
    }

    const [, atomTerm, newState] = parseAtomic(currentState);
    resultTerm = resultTerm === undefined
      ? atomTerm
      : combine(resultTerm, atomTerm);
    currentState = newState;
  }

  if (resultTerm === undefined) {
    throw errorAt(
      currentState,
      `expected a term but found ${describeNext(currentState)}`,
    );
  }

  return [
    start.buf.slice(start.idx, currentState.idx),
    resultTerm,
    currentState,
  ];
}
