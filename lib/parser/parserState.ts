import { locate, ParseError } from "./parseError.js";
import {
  DEFINE,
  FN,
  HASH,
  IDENTIFIER_CHAR_REGEX,
  LEFT_PAREN,
  NEWLINE,
  RIGHT_PAREN,
  WHITESPACE_REGEX,
} from "./consts.js";

export interface ParserState {
  readonly buf: string;
  readonly idx: number;
}

export function createParserState(buf: string): ParserState {
  return { buf, idx: 0 };
}

/**
 * Builds a ParseError pointing at the current position.
 */
export function errorAt(state: ParserState, reason: string): ParseError {
  return new ParseError(reason, locate(state.buf, state.idx));
}

/**
 * Skips whitespace and `#` comments, which run to the end of the line.
 */
export function skipWhitespace(state: ParserState): ParserState {
  let idx = state.idx;
  while (idx < state.buf.length) {
    const ch = state.buf[idx];
    if (WHITESPACE_REGEX.test(ch)) {
      idx++;
    } else if (ch === HASH) {
      while (idx < state.buf.length && state.buf[idx] !== NEWLINE) {
        idx++;
      }
    } else {
      break;
    }
  }
  return { buf: state.buf, idx };
}

/**
 * The whole code point at `idx`, one or two UTF-16 units long.
 */
export function charAt(buf: string, idx: number): string | null {
  const codePoint = buf.codePointAt(idx);
  return codePoint === undefined ? null : String.fromCodePoint(codePoint);
}

export function peek(state: ParserState): [string | null, ParserState] {
  const newState = skipWhitespace(state);
  return [charAt(newState.buf, newState.idx), newState];
}

/**
 * Whether the next token (after whitespace) starts with `token`.
 */
export function peekToken(state: ParserState, token: string): boolean {
  const newState = skipWhitespace(state);
  return newState.buf.startsWith(token, newState.idx);
}

export function consume(state: ParserState, n = 1): ParserState {
  return { buf: state.buf, idx: state.idx + n };
}

/**
 * Describes the upcoming input for error messages.
 */
export function describeNext(state: ParserState): string {
  const [word] = scanIdentifier(state);
  if (word.length > 0) return `'${word}'`;
  const [next] = peek(state);
  return next === null ? "end of input" : `'${next}'`;
}

export function matchCh(state: ParserState, ch: string): ParserState {
  return matchToken(state, ch);
}

export function matchToken(state: ParserState, token: string): ParserState {
  const newState = skipWhitespace(state);
  if (!newState.buf.startsWith(token, newState.idx)) {
    throw errorAt(
      newState,
      `expected '${token}' but found ${describeNext(newState)}`,
    );
  }
  return consume(newState, token.length);
}

export function matchLP(state: ParserState): ParserState {
  return matchCh(state, LEFT_PAREN);
}

export function matchRP(state: ParserState): ParserState {
  return matchCh(state, RIGHT_PAREN);
}

/**
 * Reads the longest run of identifier characters without failing; the
 * returned word is empty when no identifier starts here. Characters are
 * read by code point, so letters outside the Basic Multilingual Plane are
 * accepted.
 */
export function scanIdentifier(state: ParserState): [string, ParserState] {
  const start = skipWhitespace(state);
  let idx = start.idx;
  for (
    let ch = charAt(start.buf, idx);
    ch !== null && IDENTIFIER_CHAR_REGEX.test(ch);
    ch = charAt(start.buf, idx)
  ) {
    idx += ch.length;
  }
  return [start.buf.slice(start.idx, idx), { buf: start.buf, idx }];
}

/**
 * Parses a binder or variable name. The keyword `fn` is not a name.
 */
export function parseIdentifier(state: ParserState): [string, ParserState] {
  const [id, nextState] = scanIdentifier(state);
  if (id.length === 0) {
    throw errorAt(
      skipWhitespace(state),
      `expected an identifier but found ${describeNext(state)}`,
    );
  }
  if (id === FN) {
    throw errorAt(
      skipWhitespace(state),
      `expected an identifier but found keyword '${FN}'`,
    );
  }
  return [id, nextState];
}

export function remaining(state: ParserState): [boolean, ParserState] {
  const newState = skipWhitespace(state);
  return [newState.idx < newState.buf.length, newState];
}

/**
 * Whether the input continues with `<identifier> :=`, i.e. a new definition.
 * Looks ahead one identifier and one token.
 */
export function isAtDefinitionStart(state: ParserState): boolean {
  const [word, afterWord] = scanIdentifier(state);
  return word.length > 0 && word !== FN && peekToken(afterWord, DEFINE);
}
