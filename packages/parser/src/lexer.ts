import { fail, ok, tokenMismatch } from './errors';
import * as scanner from './scanner';
import { Cursor, Result, Token, TokenType } from './types';

/**
 * Lexer for dollarscript
 * Hands tokens to the parser on demand, with one token of lookahead.
 *
 * `cursor` always sits after the last consumed token. A peeked token is
 * kept in `lookahead` together with the cursor after it, so peeking never
 * moves `line`.
 */
export class Lexer {
  private cursor: Cursor;
  private lookahead: { token: Token; after: Cursor } | undefined;

  constructor(source: string) {
    this.cursor = scanner.createCursor(source);
  }

  /** Line of the last consumed token */
  get line(): number {
    return this.cursor.line;
  }

  get remaining(): string {
    return scanner.remaining(this.cursor);
  }

  /** Kind of the buffered lookahead token, `None` if the slot is empty */
  get pending(): TokenType {
    return this.lookahead ? this.lookahead.token.type : TokenType.None;
  }

  // Raw text operations work from the last consumed position and drop any
  // pending lookahead.

  skip(n: number): void {
    this.lookahead = undefined;
    this.cursor = scanner.skip(this.cursor, n);
  }

  scanName(): { name: string; type: TokenType.Name | TokenType.Print } | undefined {
    this.lookahead = undefined;
    const scanned = scanner.scanName(this.cursor);
    if (!scanned) return undefined;
    this.cursor = scanned.cursor;
    return scanned.value;
  }

  isBlankAhead(): boolean {
    this.lookahead = undefined;
    const { value, cursor } = scanner.isBlankAhead(this.cursor);
    this.cursor = cursor;
    return value;
  }

  scanUntilToken(target: string): Result<string> {
    this.lookahead = undefined;
    const result = scanner.scanUntilToken(this.cursor, target);
    if (!result.ok) return result;
    this.cursor = result.value.cursor;
    return ok(result.value.value);
  }

  /**
   * Classify the token at the last consumed position
   */
  matchToken(): Result<Token> {
    this.lookahead = undefined;
    const result = scanner.matchToken(this.cursor);
    if (!result.ok) return result;
    this.cursor = result.value.cursor;
    return ok(result.value.value);
  }

  /**
   * Consume the next token, taking the buffered one first
   */
  getNextToken(): Result<Token> {
    if (this.lookahead) {
      const { token, after } = this.lookahead;
      this.cursor = after;
      this.lookahead = undefined;
      return ok(token);
    }
    return this.matchToken();
  }

  /**
   * Peek the next token kind
   */
  lookAhead(): Result<TokenType> {
    const peeked = this.peek();
    if (!peeked.ok) return peeked;
    return ok(peeked.value.type);
  }

  /**
   * Consume the next token only if it is of the given kind.
   * Returns whether a token was skipped.
   */
  lookAheadAndSkip(type: TokenType): Result<boolean> {
    const peeked = this.peek();
    if (!peeked.ok) return peeked;
    if (peeked.value.type !== type) return ok(false);

    this.getNextToken();
    return ok(true);
  }

  /**
   * Consume the next token, which must be of the given kind
   */
  findAndConsume(type: TokenType): Result<Token> {
    const next = this.getNextToken();
    if (!next.ok) return next;

    const token = next.value;
    if (token.type !== type) {
      return fail(tokenMismatch(type, token.type, token.value, token.line));
    }
    return next;
  }

  private peek(): Result<Token> {
    if (this.lookahead) return ok(this.lookahead.token);

    const result = scanner.matchToken(this.cursor);
    if (!result.ok) return result;

    this.lookahead = { token: result.value.value, after: result.value.cursor };
    return ok(result.value.value);
  }
}

/**
 * Convenience function to tokenize source.
 * Stops after EOF or at the first lexical error.
 */
export function tokenize(source: string): Result<Token[]> {
  const lexer = new Lexer(source);
  const tokens: Token[] = [];

  for (;;) {
    const next = lexer.getNextToken();
    if (!next.ok) return next;
    tokens.push(next.value);
    if (next.value.type === TokenType.EOF) return ok(tokens);
  }
}
