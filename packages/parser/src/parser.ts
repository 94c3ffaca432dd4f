import { Lexer } from './lexer';
import { errorChain, fail, ok, ruleError, toDiagnostic } from './errors';
import {
  TokenType,
  NodeType,
  SourceCodeNode,
  StatementNode,
  AssignmentNode,
  PrintNode,
  VariableNode,
  DiagnosticSeverity,
  ParseErrorKind,
  ParseResult,
  Result,
} from './types';

/**
 * Recursive-descent parser for dollarscript
 * Aborts on the first error; there is no partial tree.
 *
 * Each rule pulls tokens straight from the lexer. Once a token is consumed
 * it stays consumed, even when the rule fails further on.
 */
export class Parser {
  readonly lexer: Lexer;

  constructor(source: string) {
    this.lexer = new Lexer(source);
  }

  /**
   * Parse the whole source. A parser instance is good for one call.
   */
  parse(): ParseResult {
    const parsed = this.parseSourceCode();
    if (!parsed.ok) {
      return {
        ok: false,
        error: parsed.error,
        diagnostics: errorChain(parsed.error).map(e => toDiagnostic(e)),
      };
    }

    // Reached only when parseStatements stops short of EOF; the tree is still returned
    const eof = this.lexer.findAndConsume(TokenType.EOF);
    const diagnostics = eof.ok
      ? []
      : [
          toDiagnostic(
            ruleError(
              ParseErrorKind.TrailingContent,
              'parse',
              eof.error.line,
              'Unexpected content after end of program',
              eof.error
            ),
            DiagnosticSeverity.Warning
          ),
        ];

    return { ok: true, program: parsed.value, diagnostics };
  }

  parseSourceCode(): Result<SourceCodeNode> {
    const leading = this.lexer.lookAheadAndSkip(TokenType.Ignored);
    if (!leading.ok) return leading;

    const line = this.lexer.line;
    const statements = this.parseStatements();
    if (!statements.ok) return statements;

    return ok<SourceCodeNode>({ type: NodeType.SourceCode, line, statements: statements.value });
  }

  parseStatements(): Result<StatementNode[]> {
    const statements: StatementNode[] = [];

    for (;;) {
      const skipped = this.lexer.lookAheadAndSkip(TokenType.Ignored);
      if (!skipped.ok) return skipped;

      const next = this.lexer.lookAhead();
      if (!next.ok) return next;
      if (next.value === TokenType.EOF) return ok(statements);

      const stmt = this.parseStatement();
      if (!stmt.ok) return stmt;
      statements.push(stmt.value);
    }
  }

  parseStatement(): Result<StatementNode> {
    const next = this.lexer.lookAhead();
    if (!next.ok) return next;

    switch (next.value) {
      case TokenType.Print:
        return this.parsePrint();
      case TokenType.VarPrefix:
        return this.parseAssignment();
      default:
        return fail(
          ruleError(
            ParseErrorKind.UnknownStatement,
            'parseStatement',
            this.lexer.line,
            `Unknown statement starting with ${next.value}`
          )
        );
    }
  }

  /**
   * $name = "value"
   */
  parseAssignment(): Result<AssignmentNode> {
    const line = this.lexer.line;

    const variable = this.parseVariable();
    if (!variable.ok) return variable;

    const beforeEqual = this.lexer.lookAheadAndSkip(TokenType.Ignored);
    if (!beforeEqual.ok) return beforeEqual;

    const equal = this.lexer.findAndConsume(TokenType.Equal);
    if (!equal.ok) return equal;

    const afterEqual = this.lexer.lookAheadAndSkip(TokenType.Ignored);
    if (!afterEqual.ok) return afterEqual;

    const value = this.parseString();
    if (!value.ok) return value;

    const trailing = this.lexer.lookAheadAndSkip(TokenType.Ignored);
    if (!trailing.ok) return trailing;

    return ok<AssignmentNode>({ type: NodeType.Assignment, line, variable: variable.value, value: value.value });
  }

  /**
   * print($name)
   */
  parsePrint(): Result<PrintNode> {
    const line = this.lexer.line;

    const keyword = this.lexer.findAndConsume(TokenType.Print);
    if (!keyword.ok) return keyword;

    const open = this.lexer.findAndConsume(TokenType.LeftParen);
    if (!open.ok) return open;

    const afterOpen = this.lexer.lookAheadAndSkip(TokenType.Ignored);
    if (!afterOpen.ok) return afterOpen;

    const variable = this.parseVariable();
    if (!variable.ok) return variable;

    const beforeClose = this.lexer.lookAheadAndSkip(TokenType.Ignored);
    if (!beforeClose.ok) return beforeClose;

    const close = this.lexer.findAndConsume(TokenType.RightParen);
    if (!close.ok) return close;

    const trailing = this.lexer.lookAheadAndSkip(TokenType.Ignored);
    if (!trailing.ok) return trailing;

    return ok<PrintNode>({ type: NodeType.Print, line, variable: variable.value });
  }

  /**
   * $name, with the line taken before the "$"
   */
  parseVariable(): Result<VariableNode> {
    const line = this.lexer.line;

    const prefix = this.lexer.findAndConsume(TokenType.VarPrefix);
    if (!prefix.ok) {
      return fail(
        ruleError(
          ParseErrorKind.VariablePrefixExpected,
          'parseVariable',
          line,
          'Expected a "$"',
          prefix.error
        )
      );
    }

    const name = this.parseName();
    if (!name.ok) {
      return fail(
        ruleError(
          ParseErrorKind.VariableNameExpected,
          'parseVariable',
          line,
          'Expected a variable name',
          name.error
        )
      );
    }

    const trailing = this.lexer.lookAheadAndSkip(TokenType.Ignored);
    if (!trailing.ok) return trailing;

    return ok<VariableNode>({ type: NodeType.Variable, line, name: name.value });
  }

  /**
   * Either "" or "..." up to the next double quote. No escapes.
   */
  parseString(): Result<string> {
    const next = this.lexer.lookAhead();
    if (!next.ok) return next;

    switch (next.value) {
      case TokenType.DuoQuote: {
        const quotes = this.lexer.findAndConsume(TokenType.DuoQuote);
        if (!quotes.ok) return quotes;

        const trailing = this.lexer.lookAheadAndSkip(TokenType.Ignored);
        if (!trailing.ok) return trailing;
        return ok('');
      }

      case TokenType.Quote: {
        const open = this.lexer.findAndConsume(TokenType.Quote);
        if (!open.ok) return open;

        const text = this.lexer.scanUntilToken('"');
        if (!text.ok) return text;

        const close = this.lexer.findAndConsume(TokenType.Quote);
        if (!close.ok) return close;

        const trailing = this.lexer.lookAheadAndSkip(TokenType.Ignored);
        if (!trailing.ok) return trailing;
        return ok(text.value);
      }

      default:
        return fail(
          ruleError(
            ParseErrorKind.NotAString,
            'parseString',
            this.lexer.line,
            `Expected a string but got ${next.value}`
          )
        );
    }
  }

  parseName(): Result<string> {
    const token = this.lexer.findAndConsume(TokenType.Name);
    if (!token.ok) return token;
    return ok(token.value.value);
  }
}

/**
 * Convenience function to parse source
 */
export function parse(source: string): ParseResult {
  const parser = new Parser(source);
  return parser.parse();
}
