/**
 * Token types for the lexer
 */
export enum TokenType {
  EOF = 'EOF',
  VarPrefix = 'VarPrefix',     // $
  LeftParen = 'LeftParen',     // (
  RightParen = 'RightParen',   // )
  Equal = 'Equal',             // =
  Quote = 'Quote',             // "
  DuoQuote = 'DuoQuote',       // ""
  Name = 'Name',
  Print = 'Print',             // print
  Ignored = 'Ignored',         // blanks and newlines
  None = 'None',               // no token
}

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly line: number;       // 1-indexed
}

/**
 * Immutable scan position. Every scanning step returns a new cursor.
 */
export interface Cursor {
  readonly source: string;
  readonly offset: number;
  readonly line: number;
}

/**
 * A value produced by a scanning step, with the cursor after it
 */
export interface Scanned<T> {
  readonly value: T;
  readonly cursor: Cursor;
}

/**
 * AST Node types
 */
export enum NodeType {
  SourceCode = 'SourceCode',
  Assignment = 'Assignment',
  Print = 'Print',
  Variable = 'Variable',
}

export interface BaseNode {
  readonly type: NodeType;
  readonly line: number;
}

/**
 * Variable reference: $name
 */
export interface VariableNode extends BaseNode {
  readonly type: NodeType.Variable;
  readonly name: string;
}

/**
 * Assignment: $name = "value"
 */
export interface AssignmentNode extends BaseNode {
  readonly type: NodeType.Assignment;
  readonly variable: VariableNode;
  readonly value: string;
}

/**
 * Print call: print($name)
 */
export interface PrintNode extends BaseNode {
  readonly type: NodeType.Print;
  readonly variable: VariableNode;
}

export type StatementNode = AssignmentNode | PrintNode;

/**
 * Program (root) node
 */
export interface SourceCodeNode extends BaseNode {
  readonly type: NodeType.SourceCode;
  readonly statements: readonly StatementNode[];
}

export enum ParseErrorKind {
  UnexpectedSymbol = 'UnexpectedSymbol',
  ScanTargetNotFound = 'ScanTargetNotFound',
  SyntaxError = 'SyntaxError',
  NotAString = 'NotAString',
  VariablePrefixExpected = 'VariablePrefixExpected',
  VariableNameExpected = 'VariableNameExpected',
  UnknownStatement = 'UnknownStatement',
  TrailingContent = 'TrailingContent',
}

export interface ParseError {
  kind: ParseErrorKind;
  /** Lexer operation or grammar rule that failed */
  rule: string;
  line: number;
  message: string;
  /** Offending character or token text */
  near?: string;
  expected?: TokenType;
  actual?: TokenType;
  cause?: ParseError;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ParseError };

/**
 * Diagnostic severity levels
 */
export enum DiagnosticSeverity {
  Error = 1,
  Warning = 2,
  Information = 3,
  Hint = 4,
}

export interface Diagnostic {
  kind: ParseErrorKind | 'Semantic';
  line: number;
  message: string;
  severity: DiagnosticSeverity;
}

/**
 * Parse result: the tree on success, the first error otherwise
 */
export type ParseResult =
  | { ok: true; program: SourceCodeNode; diagnostics: Diagnostic[] }
  | { ok: false; error: ParseError; diagnostics: Diagnostic[] };
