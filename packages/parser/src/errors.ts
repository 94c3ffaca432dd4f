import {
  Diagnostic,
  DiagnosticSeverity,
  ParseError,
  ParseErrorKind,
  Result,
  TokenType,
} from './types';

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: ParseError): Result<T> {
  return { ok: false, error };
}

export function unexpectedSymbol(symbol: string, line: number): ParseError {
  return {
    kind: ParseErrorKind.UnexpectedSymbol,
    rule: 'matchToken',
    line,
    near: symbol,
    message: `Unexpected symbol near '${symbol}' at line ${line}`,
  };
}

export function scanTargetNotFound(target: string, line: number): ParseError {
  return {
    kind: ParseErrorKind.ScanTargetNotFound,
    rule: 'scanUntilToken',
    line,
    near: target,
    message: `Expected '${target}' before end of input at line ${line}`,
  };
}

export function tokenMismatch(
  expected: TokenType,
  actual: TokenType,
  near: string,
  line: number
): ParseError {
  return {
    kind: ParseErrorKind.SyntaxError,
    rule: 'findAndConsume',
    line,
    near,
    expected,
    actual,
    message: `Syntax error near '${near || actual}': expected ${expected} but got ${actual} at line ${line}`,
  };
}

/**
 * Wrap a lower-level failure in a rule-specific error
 */
export function ruleError(
  kind: ParseErrorKind,
  rule: string,
  line: number,
  message: string,
  cause?: ParseError
): ParseError {
  return { kind, rule, line, message: `${message} at line ${line}`, cause };
}

/**
 * Flatten an error and its causes, innermost first
 */
export function errorChain(error: ParseError): ParseError[] {
  const chain: ParseError[] = [];
  for (let e: ParseError | undefined = error; e; e = e.cause) {
    chain.unshift(e);
  }
  return chain;
}

export function toDiagnostic(
  error: ParseError,
  severity: DiagnosticSeverity = DiagnosticSeverity.Error
): Diagnostic {
  return { kind: error.kind, line: error.line, message: error.message, severity };
}
