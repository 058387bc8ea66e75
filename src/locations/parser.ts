/**
 * Recursive-descent parser for GenBank location expressions
 *
 * ```
 * location := call | remote | site
 * call     := ("join" | "order") "(" location ("," location)* ")"
 *           | "complement" "(" location ")"
 * remote   := ACCESSION ":" location
 * site     := position [".." position | "^" position]
 * position := ["<" | ">"] integer | "?" [integer]
 * ```
 *
 * @module locations/parser
 */

import { InvalidLocationError, LocationSyntaxError } from "../errors";
import * as build from "./builders";
import { tokenize, type Token, type TokenType } from "./lexer";
import { after, before, exact, type Position, unknown } from "./position";
import type { Location } from "./types";

const OPERATORS = new Set(["join", "order", "complement"]);

class LocationParser {
  private readonly tokens: Token[];
  private index = 0;

  constructor(
    private readonly input: string,
    private readonly lineNumber?: number
  ) {
    this.tokens = tokenize(input, lineNumber);
  }

  parse(): Location {
    const location = this.parseLocation();
    const trailing = this.peek();
    if (trailing.type !== "end") {
      throw this.error(
        trailing.type === "rparen" ? "Unbalanced ')'" : "Unexpected trailing input",
        trailing,
        this.input.slice(trailing.offset)
      );
    }
    return location;
  }

  private parseLocation(): Location {
    const token = this.peek();

    if (token.type === "identifier") {
      const next = this.peek(1);
      if (next.type === "lparen") return this.parseCall();
      if (next.type === "colon") return this.parseRemote();
      throw this.error(`Unknown location operator '${token.text}'`, token);
    }

    return this.parseSite();
  }

  private parseCall(): Location {
    const name = this.advance();
    if (!OPERATORS.has(name.text)) {
      throw this.error(`Unknown location operator '${name.text}'`, name);
    }
    const open = this.expect("lparen", `'(' after ${name.text}`);

    if (this.peek().type === "rparen") {
      throw this.error(`Empty ${name.text} list`, name, this.input.slice(name.offset, this.peek().offset + 1));
    }

    const parts: Location[] = [this.parseLocation()];
    while (this.peek().type === "comma") {
      this.advance();
      parts.push(this.parseLocation());
    }

    const close = this.peek();
    if (close.type !== "rparen") {
      throw this.error(
        close.type === "end" ? `Unbalanced '(' in ${name.text}` : `Expected ',' or ')' in ${name.text}`,
        close.type === "end" ? open : close,
        close.type === "end" ? this.input.slice(name.offset) : undefined
      );
    }
    this.advance();

    if (name.text === "complement") {
      const [inner, ...extra] = parts;
      if (inner === undefined || extra.length > 0) {
        throw this.error("complement takes exactly one location", name, this.input.slice(name.offset, close.offset + 1));
      }
      return build.complement(inner);
    }
    return name.text === "join" ? build.join(parts) : build.order(parts);
  }

  private parseRemote(): Location {
    const accession = this.advance();
    this.advance(); // ':'
    return build.remote(accession.text, this.parseLocation());
  }

  private parseSite(): Location {
    const first = this.peek();
    const start = this.parsePosition();

    if (this.peek().type === "range") {
      this.advance();
      const end = this.parsePosition();
      return this.structural(() => build.range(start, end), first);
    }

    if (this.peek().type === "caret") {
      const caret = this.advance();
      const right = this.parsePosition();
      if (start.fuzzy !== "exact" || right.fuzzy !== "exact") {
        throw this.error("Site bounds must be exact", caret, this.input.slice(first.offset, this.peek().offset));
      }
      return this.structural(() => build.between(start.coordinate, right.coordinate), first);
    }

    return build.single(start);
  }

  private parsePosition(): Position {
    const token = this.peek();

    if (token.type === "question") {
      this.advance();
      return this.peek().type === "number" ? unknown(this.parseCoordinate()) : unknown();
    }
    if (token.type === "less") {
      this.advance();
      return before(this.parseCoordinate());
    }
    if (token.type === "greater") {
      this.advance();
      return after(this.parseCoordinate());
    }
    return exact(this.parseCoordinate());
  }

  private parseCoordinate(): number {
    const token = this.peek();
    if (token.type !== "number") {
      throw this.error(
        token.type === "end" ? "Unexpected end of location" : "Expected a position",
        token
      );
    }
    this.advance();

    const value = Number(token.text);
    if (!Number.isSafeInteger(value) || value < 1) {
      throw this.error("Position must be an integer >= 1", token);
    }
    return value;
  }

  /**
   * Re-raise builder invariant violations as syntax errors at the site
   */
  private structural(create: () => Location, first: Token): Location {
    try {
      return create();
    } catch (error) {
      if (error instanceof InvalidLocationError) {
        throw this.error(error.message, first, this.input.slice(first.offset, this.peek().offset).trim());
      }
      throw error;
    }
  }

  private peek(ahead = 0): Token {
    const token = this.tokens[Math.min(this.index + ahead, this.tokens.length - 1)];
    if (token === undefined) {
      throw new LocationSyntaxError("Empty location", this.input, 0, "");
    }
    return token;
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== "end") this.index++;
    return token;
  }

  private expect(type: TokenType, description: string): Token {
    const token = this.peek();
    if (token.type !== type) {
      throw this.error(`Expected ${description}`, token);
    }
    return this.advance();
  }

  private error(message: string, token: Token, fragment?: string): LocationSyntaxError {
    return new LocationSyntaxError(
      message,
      this.input,
      token.offset,
      fragment ?? (token.type === "end" ? "<end>" : token.text),
      this.lineNumber
    );
  }
}

/**
 * Parse a location expression into a tree
 *
 * @param raw - Location text as written in a feature table
 * @param lineNumber - Source line, attached to errors
 * @throws {LocationSyntaxError} On malformed input; no partial tree is returned
 *
 * @example
 * ```typescript
 * parseLocation("join(1..10,complement(20..30))");
 * // { kind: "join", parts: [range 1..10, complement(range 20..30)] }
 * ```
 */
export function parseLocation(raw: string, lineNumber?: number): Location {
  if (raw.trim() === "") {
    throw new LocationSyntaxError("Empty location", raw, 0, raw, lineNumber);
  }
  return new LocationParser(raw, lineNumber).parse();
}
