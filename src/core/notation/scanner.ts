/**
 * Character scanner shared by the item, duration and constraint parsers.
 * Every failure is a ParseError pointing at the scanner's position.
 */

import { ParseError } from '../errors.js';

const WHITESPACE = /\s/;

export class Scanner {
  pos = 0;

  constructor(readonly input: string) {}

  get done(): boolean {
    return this.pos >= this.input.length;
  }

  /** Character at `pos + offset`, or '' past the end. */
  peek(offset = 0): string {
    return this.input.charAt(this.pos + offset);
  }

  startsWith(text: string): boolean {
    return this.input.startsWith(text, this.pos);
  }

  /** Advance past `text` if it is next. */
  consume(text: string): boolean {
    if (!this.startsWith(text)) return false;
    this.pos += text.length;
    return true;
  }

  expect(text: string, what: string): void {
    if (!this.consume(text)) {
      this.fail(`Expected ${what}`);
    }
  }

  /** Read one character. */
  next(): string {
    const ch = this.peek();
    this.pos += ch.length;
    return ch;
  }

  readWhile(test: (ch: string) => boolean): string {
    const start = this.pos;
    while (!this.done && test(this.peek())) this.pos++;
    return this.input.slice(start, this.pos);
  }

  readToken(): string {
    return this.readWhile((ch) => !WHITESPACE.test(ch));
  }

  /** Skip whitespace, returning how much was skipped. */
  skipWhitespace(): number {
    return this.readWhile((ch) => WHITESPACE.test(ch)).length;
  }

  requireWhitespace(before: string): void {
    if (this.skipWhitespace() === 0) {
      this.fail(this.done ? `Missing ${before}` : `Expected whitespace before ${before}`);
    }
  }

  /** Rest of the input, consumed. */
  rest(): string {
    const text = this.input.slice(this.pos);
    this.pos = this.input.length;
    return text;
  }

  /**
   * Read a JSON string literal starting at the current `"` and decode it.
   */
  readJsonString(what: string): string {
    if (this.peek() !== '"') this.fail(`Expected ${what} as a JSON string`);
    const start = this.pos;
    let i = start + 1;
    while (i < this.input.length) {
      const ch = this.input.charAt(i);
      if (ch === '\\') {
        i += 2;
        continue;
      }
      if (ch === '"') break;
      i++;
    }
    if (i >= this.input.length) this.fail(`Unterminated ${what}`);

    const literal = this.input.slice(start, i + 1);
    let decoded: unknown;
    try {
      decoded = JSON.parse(literal);
    } catch (err) {
      this.fail(`Invalid JSON in ${what}`, err);
    }
    if (typeof decoded !== 'string') this.fail(`Invalid JSON in ${what}`);
    this.pos = i + 1;
    return decoded;
  }

  fail(message: string, cause?: unknown): never {
    throw new ParseError(message, this.input, { column: this.pos, cause });
  }
}
