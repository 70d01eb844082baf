/**
 * Parser for whole programs: a sequence of `name := term` definitions, each
 * optionally terminated by `;`, ending in the main term. The main term is
 * written either as `main := term` or as a bare term after the last `;`.
 *
 * @example
 * ```ts
 * const program = parseProgram(`
 *   id := fn x => x;
 *   main := id id;
 * `);
 * ```
 *
 * @module
 */
import {
  mkDefinition,
  mkProgram,
  MAIN,
  type Definition,
  type Program,
} from "../terms/program.js";
import type { UntypedLambda } from "../terms/lambda.js";
import {
  createParserState,
  errorAt,
  matchToken,
  parseIdentifier,
  type ParserState,
  isAtDefinitionStart,
  peekToken,
  remaining,
  skipWhitespace,
} from "./parserState.js";
import { parseUntypedLambdaInternal } from "./untyped.js";
import { DEFINE, SEMICOLON } from "./consts.js";

export function parseDefinition(
  state: ParserState,
): [Definition, ParserState] {
  const [name, stateAfterName] = parseIdentifier(state);
  const stateAfterDefine = matchToken(stateAfterName, DEFINE);
  const [, term, stateAfterTerm] = parseUntypedLambdaInternal(
    stateAfterDefine,
  );
  return [mkDefinition(name, term), skipTerminator(stateAfterTerm)];
}

function skipTerminator(state: ParserState): ParserState {
  return peekToken(state, SEMICOLON)
    ? matchToken(state, SEMICOLON)
    : skipWhitespace(state);
}

function expectEnd(state: ParserState): void {
  const [hasRemaining, finalState] = remaining(state);
  if (hasRemaining) {
    throw errorAt(
      finalState,
      `unexpected input after main term: "${finalState.buf.slice(finalState.idx)}"`,
    );
  }
}

/**
 * Parses a complete source file.
 *
 * @throws ParseError on the first syntax error, or when the file has no main
 * term.
 */
export function parseProgram(input: string): Program {
  const definitions: Definition[] = [];
  let state = createParserState(input);

  for (;;) {
    const [hasRemaining, current] = remaining(state);
    if (!hasRemaining) {
      throw errorAt(current, "expected a main term but found end of input");
    }

    let main: UntypedLambda;
    if (isAtDefinitionStart(current)) {
      const [definition, stateAfterDefinition] = parseDefinition(current);
      if (definition.name !== MAIN) {
        definitions.push(definition);
        state = stateAfterDefinition;
        continue;
      }
      main = definition.term;
      state = stateAfterDefinition;
    } else {
      const [, term, stateAfterTerm] = parseUntypedLambdaInternal(current);
      main = term;
      state = skipTerminator(stateAfterTerm);
    }

    expectEnd(state);
    return mkProgram(definitions, main);
  }
}
