/**
 * Tokenizer for GenBank location expressions
 *
 * Whitespace between tokens is skipped, so a location that wrapped across
 * feature-table lines tokenizes the same as its single-line form.
 *
 * @module locations/lexer
 */

import { LocationSyntaxError } from "../errors";

export type TokenType =
  | "number"
  | "identifier"
  | "lparen"
  | "rparen"
  | "comma"
  | "range"
  | "caret"
  | "colon"
  | "less"
  | "greater"
  | "question"
  | "end";

export interface Token {
  readonly type: TokenType;
  readonly text: string;
  /** 0-based offset of the first character in the input */
  readonly offset: number;
}

const PUNCTUATION: Record<string, TokenType> = {
  "(": "lparen",
  ")": "rparen",
  ",": "comma",
  "^": "caret",
  ":": "colon",
  "<": "less",
  ">": "greater",
  "?": "question",
};

// Accessions may carry a version suffix: J00194.1
const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_]*(?:\.[0-9]+)?/y;
const NUMBER = /[0-9]+/y;
const WHITESPACE = /\s+/y;

function matchAt(pattern: RegExp, input: string, offset: number): string | undefined {
  pattern.lastIndex = offset;
  const match = pattern.exec(input);
  return match?.[0];
}

/**
 * Split a location string into tokens, ending with an `end` token
 *
 * @throws {LocationSyntaxError} On a character no token can start with
 */
export function tokenize(input: string, lineNumber?: number): Token[] {
  const tokens: Token[] = [];
  let offset = 0;

  while (offset < input.length) {
    const space = matchAt(WHITESPACE, input, offset);
    if (space !== undefined) {
      offset += space.length;
      continue;
    }

    const char = input.charAt(offset);

    if (char === ".") {
      if (input.charAt(offset + 1) !== ".") {
        throw new LocationSyntaxError(
          "Expected '..' between range bounds",
          input,
          offset,
          input.slice(offset, offset + 2),
          lineNumber
        );
      }
      tokens.push({ type: "range", text: "..", offset });
      offset += 2;
      continue;
    }

    const punctuation = PUNCTUATION[char];
    if (punctuation !== undefined) {
      tokens.push({ type: punctuation, text: char, offset });
      offset += 1;
      continue;
    }

    const digits = matchAt(NUMBER, input, offset);
    if (digits !== undefined) {
      tokens.push({ type: "number", text: digits, offset });
      offset += digits.length;
      continue;
    }

    const word = matchAt(IDENTIFIER, input, offset);
    if (word !== undefined) {
      tokens.push({ type: "identifier", text: word, offset });
      offset += word.length;
      continue;
    }

    throw new LocationSyntaxError(
      `Unexpected character '${char}'`,
      input,
      offset,
      char,
      lineNumber
    );
  }

  tokens.push({ type: "end", text: "", offset: input.length });
  return tokens;
}
