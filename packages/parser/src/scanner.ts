import { fail, ok, scanTargetNotFound, unexpectedSymbol } from './errors';
import { Cursor, Result, Scanned, Token, TokenType } from './types';

/*
 * Pure scanning steps. Each takes a cursor and hands back the cursor
 * after whatever it consumed; nothing here holds state.
 */

export function createCursor(source: string): Cursor {
  return { source, offset: 0, line: 1 };
}

export function isAtEnd(cursor: Cursor): boolean {
  return cursor.offset >= cursor.source.length;
}

export function remaining(cursor: Cursor): string {
  return cursor.source.slice(cursor.offset);
}

export function startsWith(cursor: Cursor, text: string): boolean {
  return cursor.source.startsWith(text, cursor.offset);
}

/**
 * Drop the first n characters. Line count is left alone.
 */
export function skip(cursor: Cursor, n: number): Cursor {
  return { ...cursor, offset: Math.min(cursor.offset + n, cursor.source.length) };
}

export function isNameStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

export function isNamePart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

export function isBlank(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\f' || ch === '\n' || ch === '\r';
}

/**
 * Scan a maximal run of name characters; `print` is the only keyword
 */
export function scanName(
  cursor: Cursor
): Scanned<{ name: string; type: TokenType.Name | TokenType.Print }> | undefined {
  let end = cursor.offset;
  while (end < cursor.source.length && isNamePart(cursor.source[end])) {
    end++;
  }
  if (end === cursor.offset) return undefined;

  const name = cursor.source.slice(cursor.offset, end);
  const type = name === 'print' ? TokenType.Print : TokenType.Name;
  return { value: { name, type }, cursor: skip(cursor, name.length) };
}

/**
 * Skip blanks and newlines, counting one line per newline sequence.
 * CRLF and LFCR are a single newline.
 */
export function skipBlank(cursor: Cursor): Cursor {
  const { source } = cursor;
  let { offset, line } = cursor;

  while (offset < source.length) {
    if (source.startsWith('\r\n', offset) || source.startsWith('\n\r', offset)) {
      line++;
      offset += 2;
    } else if (source[offset] === '\n' || source[offset] === '\r') {
      line++;
      offset++;
    } else if (isBlank(source[offset])) {
      offset++;
    } else {
      break;
    }
  }

  return { source, offset, line };
}

/**
 * Skip blanks; true if nothing meaningful follows
 */
export function isBlankAhead(cursor: Cursor): Scanned<boolean> {
  const next = skipBlank(cursor);
  return { value: isAtEnd(next), cursor: next };
}

function single(cursor: Cursor, type: TokenType, length: number): Scanned<Token> {
  const value = cursor.source.slice(cursor.offset, cursor.offset + length);
  return { value: { type, value, line: cursor.line }, cursor: skip(cursor, length) };
}

/**
 * Classify the token at the cursor
 */
export function matchToken(cursor: Cursor): Result<Scanned<Token>> {
  if (isAtEnd(cursor)) {
    return ok({ value: { type: TokenType.EOF, value: '', line: cursor.line }, cursor });
  }

  const ch = cursor.source[cursor.offset];
  switch (ch) {
    case '$':
      return ok(single(cursor, TokenType.VarPrefix, 1));
    case '(':
      return ok(single(cursor, TokenType.LeftParen, 1));
    case ')':
      return ok(single(cursor, TokenType.RightParen, 1));
    case '=':
      return ok(single(cursor, TokenType.Equal, 1));
    case '"':
      return startsWith(cursor, '""')
        ? ok(single(cursor, TokenType.DuoQuote, 2))
        : ok(single(cursor, TokenType.Quote, 1));
  }

  if (isNameStart(ch)) {
    const scanned = scanName(cursor);
    if (scanned) {
      const { name, type } = scanned.value;
      return ok({ value: { type, value: name, line: cursor.line }, cursor: scanned.cursor });
    }
  }

  if (isBlank(ch)) {
    const next = skipBlank(cursor);
    return ok({ value: { type: TokenType.Ignored, value: ch, line: next.line }, cursor: next });
  }

  return fail(unexpectedSymbol(ch, cursor.line));
}

/**
 * Text up to the first occurrence of target; target itself stays unread
 */
export function scanUntilToken(cursor: Cursor, target: string): Result<Scanned<string>> {
  const index = cursor.source.indexOf(target, cursor.offset);
  if (index < 0) {
    return fail(scanTargetNotFound(target, cursor.line));
  }

  const text = cursor.source.slice(cursor.offset, index);
  return ok({ value: text, cursor: skip(cursor, text.length) });
}
