import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import { Lexer, tokenize } from './lexer';
import { ParseErrorKind, TokenType } from './types';

describe('Lexer', () => {
  describe('lookahead', () => {
    it('keeps the line of the last consumed token while peeking', () => {
      const lexer = new Lexer('\n\n$x');
      const peeked = lexer.lookAhead();
      assert.ok(peeked.ok);
      assert.strictEqual(peeked.value, TokenType.Ignored);
      assert.strictEqual(lexer.line, 1);
      assert.strictEqual(lexer.pending, TokenType.Ignored);

      const next = lexer.getNextToken();
      assert.ok(next.ok);
      assert.strictEqual(next.value.line, 3);
      assert.strictEqual(lexer.line, 3);
      assert.strictEqual(lexer.pending, TokenType.None);
    });

    it('skips only a token of the expected kind', () => {
      const lexer = new Lexer(' $');
      const first = lexer.lookAheadAndSkip(TokenType.Ignored);
      assert.ok(first.ok);
      assert.strictEqual(first.value, true);
      assert.strictEqual(lexer.pending, TokenType.None);

      const second = lexer.lookAheadAndSkip(TokenType.Ignored);
      assert.ok(second.ok);
      assert.strictEqual(second.value, false);
      assert.strictEqual(lexer.pending, TokenType.VarPrefix);
    });

    it('surfaces lexical errors from a peek', () => {
      const lexer = new Lexer('%');
      const result = lexer.lookAheadAndSkip(TokenType.Ignored);
      assert.ok(!result.ok);
      assert.strictEqual(result.error.kind, ParseErrorKind.UnexpectedSymbol);
    });
  });

  describe('findAndConsume', () => {
    it('returns the token when the kind matches', () => {
      const lexer = new Lexer('abc');
      const result = lexer.findAndConsume(TokenType.Name);
      assert.ok(result.ok);
      assert.deepStrictEqual(result.value, { type: TokenType.Name, value: 'abc', line: 1 });
    });

    it('reports expected and actual kinds on a mismatch', () => {
      const lexer = new Lexer('=');
      const result = lexer.findAndConsume(TokenType.VarPrefix);
      assert.ok(!result.ok);
      assert.strictEqual(result.error.kind, ParseErrorKind.SyntaxError);
      assert.strictEqual(result.error.expected, TokenType.VarPrefix);
      assert.strictEqual(result.error.actual, TokenType.Equal);
      assert.strictEqual(
        result.error.message,
        "Syntax error near '=': expected VarPrefix but got Equal at line 1"
      );
    });
  });

  describe('raw text operations', () => {
    it('scans from the last consumed position and drops the lookahead', () => {
      const lexer = new Lexer('ab"');
      lexer.lookAhead();
      assert.strictEqual(lexer.pending, TokenType.Name);

      const text = lexer.scanUntilToken('"');
      assert.ok(text.ok);
      assert.strictEqual(text.value, 'ab');
      assert.strictEqual(lexer.pending, TokenType.None);
      assert.strictEqual(lexer.remaining, '"');
    });

    it('skips characters and blank runs', () => {
      const lexer = new Lexer('ab  \n');
      lexer.skip(2);
      assert.strictEqual(lexer.remaining, '  \n');
      assert.strictEqual(lexer.isBlankAhead(), true);
      assert.strictEqual(lexer.remaining, '');
      assert.strictEqual(lexer.line, 2);
    });

    it('scans names directly', () => {
      const lexer = new Lexer('print(');
      assert.deepStrictEqual(lexer.scanName(), { name: 'print', type: TokenType.Print });
      assert.strictEqual(lexer.remaining, '(');
      assert.strictEqual(lexer.scanName(), undefined);
    });
  });

  describe('tokenize', () => {
    it('tokenizes an assignment', () => {
      const result = tokenize('$x = ""');
      assert.ok(result.ok);
      assert.deepStrictEqual(
        result.value.map(t => [t.type, t.value]),
        [
          [TokenType.VarPrefix, '$'],
          [TokenType.Name, 'x'],
          [TokenType.Ignored, ' '],
          [TokenType.Equal, '='],
          [TokenType.Ignored, ' '],
          [TokenType.DuoQuote, '""'],
          [TokenType.EOF, ''],
        ]
      );
    });

    it('tracks lines across CRLF', () => {
      const result = tokenize('$x\r\nprint');
      assert.ok(result.ok);
      assert.deepStrictEqual(
        result.value.map(t => [t.type, t.line]),
        [
          [TokenType.VarPrefix, 1],
          [TokenType.Name, 1],
          [TokenType.Ignored, 2],
          [TokenType.Print, 2],
          [TokenType.EOF, 2],
        ]
      );
    });

    it('stops at an unexpected symbol', () => {
      const result = tokenize('$x\n@');
      assert.ok(!result.ok);
      assert.strictEqual(result.error.line, 2);
      assert.strictEqual(result.error.near, '@');
    });
  });
});
