import { describe, it } from 'node:test';
import * as assert from 'node:assert';
import { parse, Parser } from './parser';
import {
  DiagnosticSeverity,
  NodeType,
  ParseErrorKind,
  Result,
  SourceCodeNode,
  StatementNode,
  TokenType,
} from './types';

function program(source: string): SourceCodeNode {
  const result = parse(source);
  assert.ok(result.ok, result.ok ? '' : result.error.message);
  assert.deepStrictEqual(result.diagnostics, []);
  return result.program;
}

describe('Parser', () => {
  describe('assignments', () => {
    it('parses an empty string assignment', () => {
      assert.deepStrictEqual(program('$x=""').statements, [
        {
          type: NodeType.Assignment,
          line: 1,
          variable: { type: NodeType.Variable, line: 1, name: 'x' },
          value: '',
        },
      ]);
    });

    it('allows blanks around the equals sign', () => {
      const [stmt] = program('$greeting  =\t"hello world"  ').statements;
      assert.strictEqual(stmt.type, NodeType.Assignment);
      if (stmt.type === NodeType.Assignment) {
        assert.strictEqual(stmt.variable.name, 'greeting');
        assert.strictEqual(stmt.value, 'hello world');
      }
    });

    it('keeps symbols inside strings verbatim', () => {
      const [stmt] = program('$x="$y = (z)"').statements;
      assert.strictEqual(stmt.type === NodeType.Assignment && stmt.value, '$y = (z)');
    });
  });

  describe('print statements', () => {
    it('parses an assignment followed by a print', () => {
      assert.deepStrictEqual(program('$msg="hi"\nprint($msg)'), {
        type: NodeType.SourceCode,
        line: 1,
        statements: [
          {
            type: NodeType.Assignment,
            line: 1,
            variable: { type: NodeType.Variable, line: 1, name: 'msg' },
            value: 'hi',
          },
          {
            type: NodeType.Print,
            line: 2,
            variable: { type: NodeType.Variable, line: 2, name: 'msg' },
          },
        ],
      });
    });

    it('allows blanks inside the parentheses', () => {
      const [, stmt] = program('$name = "a b"  \n  print( $name )  ').statements;
      assert.deepStrictEqual(stmt, {
        type: NodeType.Print,
        line: 2,
        variable: { type: NodeType.Variable, line: 2, name: 'name' },
      });
    });
  });

  describe('lines', () => {
    it('counts CRLF and LFCR as a single line break', () => {
      for (const newline of ['\r\n', '\n\r']) {
        const [, stmt] = program(`$a="1"${newline}print($a)`).statements;
        assert.strictEqual(stmt.line, 2);
      }
    });

    it('skips blank lines before the first statement', () => {
      const result = program('\n\n$a=""');
      assert.strictEqual(result.line, 3);
      assert.strictEqual(result.statements[0].line, 3);
    });

    it('parses blank input to an empty program', () => {
      assert.deepStrictEqual(program(' \n\t\r\n '), {
        type: NodeType.SourceCode,
        line: 3,
        statements: [],
      });
      assert.deepStrictEqual(program(''), { type: NodeType.SourceCode, line: 1, statements: [] });
    });
  });

  it('keeps statements in source order', () => {
    const { statements } = program('$a="1"\n$b="2"\nprint($b)\nprint($a)');
    assert.deepStrictEqual(
      statements.map(s => [s.type, s.variable.name, s.line]),
      [
        [NodeType.Assignment, 'a', 1],
        [NodeType.Assignment, 'b', 2],
        [NodeType.Print, 'b', 3],
        [NodeType.Print, 'a', 4],
      ]
    );
  });

  describe('errors', () => {
    it('rejects an unterminated string', () => {
      const result = parse('$x="abc');
      assert.ok(!result.ok);
      assert.strictEqual(result.error.kind, ParseErrorKind.ScanTargetNotFound);
      assert.strictEqual(result.diagnostics.length, 1);
    });

    it('rejects a bare dollar sign', () => {
      const result = parse('$');
      assert.ok(!result.ok);
      assert.strictEqual(result.error.kind, ParseErrorKind.VariableNameExpected);
      assert.strictEqual(result.error.line, 1);
      assert.strictEqual(result.error.message, 'Expected a variable name at line 1');
      assert.strictEqual(result.error.cause?.expected, TokenType.Name);
      assert.strictEqual(result.error.cause?.actual, TokenType.EOF);
      assert.deepStrictEqual(
        result.diagnostics.map(d => d.kind),
        [ParseErrorKind.SyntaxError, ParseErrorKind.VariableNameExpected]
      );
    });

    it('reports a missing name at the line of the dollar sign', () => {
      const result = parse('\n\n$');
      assert.ok(!result.ok);
      assert.strictEqual(result.error.line, 3);
    });

    it('rejects a print without a dollar sign', () => {
      const result = parse('print(x)');
      assert.ok(!result.ok);
      assert.strictEqual(result.error.kind, ParseErrorKind.VariablePrefixExpected);
    });

    it('rejects a blank between print and the parenthesis', () => {
      const result = parse('print ($x)');
      assert.ok(!result.ok);
      assert.strictEqual(result.error.kind, ParseErrorKind.SyntaxError);
      assert.strictEqual(result.error.expected, TokenType.LeftParen);
      assert.strictEqual(result.error.actual, TokenType.Ignored);
    });

    it('rejects an unclosed print', () => {
      const result = parse('print($x');
      assert.ok(!result.ok);
      assert.strictEqual(
        result.error.message,
        "Syntax error near 'EOF': expected RightParen but got EOF at line 1"
      );
    });

    it('rejects a missing equals sign', () => {
      const result = parse('$x "a"');
      assert.ok(!result.ok);
      assert.strictEqual(result.error.expected, TokenType.Equal);
      assert.strictEqual(result.error.actual, TokenType.Quote);
    });

    it('rejects a value that is not a string', () => {
      const result = parse('$x = y');
      assert.ok(!result.ok);
      assert.strictEqual(result.error.kind, ParseErrorKind.NotAString);
      assert.strictEqual(result.error.message, 'Expected a string but got Name at line 1');
    });

    it('rejects an unknown statement', () => {
      const result = parse('= "a"');
      assert.ok(!result.ok);
      assert.strictEqual(result.error.kind, ParseErrorKind.UnknownStatement);
      assert.strictEqual(result.error.message, 'Unknown statement starting with Equal at line 1');
    });

    it('discards earlier statements after an unexpected symbol', () => {
      const result = parse('$x = "a"\nprint($x) #');
      assert.ok(!result.ok);
      assert.strictEqual(result.error.kind, ParseErrorKind.UnexpectedSymbol);
      assert.strictEqual(result.error.line, 2);
      assert.strictEqual(result.error.near, '#');
    });
  });

  describe('rules', () => {
    it('parses a variable and its trailing blanks', () => {
      const parser = new Parser('$abc  ');
      const result = parser.parseVariable();
      assert.ok(result.ok);
      assert.deepStrictEqual(result.value, { type: NodeType.Variable, line: 1, name: 'abc' });
      assert.strictEqual(parser.lexer.remaining, '');
    });

    it('parses an empty string and stops at the next token', () => {
      const parser = new Parser('""  x');
      const result = parser.parseString();
      assert.ok(result.ok);
      assert.strictEqual(result.value, '');
      assert.strictEqual(parser.lexer.remaining, 'x');
    });

    it('does not restore consumed tokens after a failure', () => {
      const parser = new Parser('$x = 1');
      assert.ok(!parser.parseAssignment().ok);
      assert.strictEqual(parser.lexer.remaining, '1');
    });

    it('warns about content left after the statement list', () => {
      class StopsEarly extends Parser {
        parseStatements(): Result<StatementNode[]> {
          return { ok: true, value: [] };
        }
      }

      const result = new StopsEarly('$x=""').parse();
      assert.ok(result.ok);
      assert.deepStrictEqual(result.program.statements, []);
      assert.deepStrictEqual(result.diagnostics, [
        {
          kind: ParseErrorKind.TrailingContent,
          line: 1,
          message: 'Unexpected content after end of program at line 1',
          severity: DiagnosticSeverity.Warning,
        },
      ]);
    });
  });
});
