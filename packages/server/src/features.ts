import {
  CompletionItem,
  CompletionItemKind,
  Diagnostic as LspDiagnostic,
  DiagnosticSeverity as LspDiagnosticSeverity,
  DocumentHighlight,
  DocumentHighlightKind,
  Hover,
  Location,
  MarkupKind,
  Position,
  TextEdit,
} from 'vscode-languageserver/node';

import { TextDocument } from 'vscode-languageserver-textdocument';

import {
  analyze,
  findDefinitionAt,
  findReferences,
  format,
  getCompletions,
  getHoverInfo,
  parse,
  DiagnosticSeverity,
  SemanticAnalysis,
} from '@dollarscript/parser';

import {
  documentLine,
  indexDocument,
  lineRange,
  variableAt,
  DocumentIndex,
} from './positions';

export const SOURCE = 'dollarscript';

function mapSeverity(severity: DiagnosticSeverity): LspDiagnosticSeverity {
  switch (severity) {
    case DiagnosticSeverity.Error:
      return LspDiagnosticSeverity.Error;
    case DiagnosticSeverity.Warning:
      return LspDiagnosticSeverity.Warning;
    case DiagnosticSeverity.Information:
      return LspDiagnosticSeverity.Information;
    case DiagnosticSeverity.Hint:
      return LspDiagnosticSeverity.Hint;
  }
}

function analyzeText(text: string): SemanticAnalysis | undefined {
  const result = parse(text);
  return result.ok ? analyze(result.program) : undefined;
}

/**
 * Index and analysis of a document; undefined when it does not parse
 */
function openDocument(
  document: TextDocument
): { index: DocumentIndex; analysis: SemanticAnalysis } | undefined {
  const analysis = analyzeText(document.getText());
  if (!analysis) return undefined;
  return { index: indexDocument(document), analysis };
}

/**
 * Parse and semantic diagnostics for a document
 */
export function computeDiagnostics(document: TextDocument): LspDiagnostic[] {
  const result = parse(document.getText());
  const diagnostics = result.ok
    ? [...result.diagnostics, ...analyze(result.program).diagnostics]
    : result.diagnostics;
  if (diagnostics.length === 0) return [];

  const index = indexDocument(document);
  return diagnostics.map(diag => ({
    range: lineRange(document, documentLine(index, diag.line)),
    message: diag.message,
    severity: mapSeverity(diag.severity),
    source: SOURCE,
  }));
}

/**
 * Variables assigned above the cursor line.
 * Only the text above is parsed, since the current line is being typed.
 */
export function completions(document: TextDocument, position: Position): CompletionItem[] {
  const above = document.getText().slice(0, document.offsetAt({ line: position.line, character: 0 }));
  const analysis = analyzeText(above);
  if (!analysis) return [];

  return getCompletions(analysis, Number.POSITIVE_INFINITY).map(def => ({
    label: def.name,
    kind: CompletionItemKind.Variable,
    detail: `"${def.value}"`,
  }));
}

export function hover(document: TextDocument, position: Position): Hover | null {
  const opened = openDocument(document);
  if (!opened) return null;

  const found = variableAt(opened.index, position.line, position.character);
  if (!found) return null;

  const info = getHoverInfo(opened.analysis, found.position);
  if (!info) return null;

  const value = info.definition
    ? `**variable** \`$${info.name}\` = \`"${info.definition.value}"\` (line ${info.definition.line})`
    : `**variable** \`$${info.name}\` (unassigned)`;

  return {
    contents: { kind: MarkupKind.Markdown, value },
    range: found.occurrence.range,
  };
}

export function definition(document: TextDocument, position: Position): Location | null {
  const opened = openDocument(document);
  if (!opened) return null;

  const found = variableAt(opened.index, position.line, position.character);
  if (!found) return null;

  const def = findDefinitionAt(opened.analysis, found.position);
  if (!def) return null;

  const target = opened.index.variables[def.statementIndex];
  return { uri: document.uri, range: target.range };
}

export function references(document: TextDocument, position: Position): Location[] {
  const opened = openDocument(document);
  if (!opened) return [];

  const found = variableAt(opened.index, position.line, position.character);
  if (!found) return [];

  return findReferences(opened.analysis, found.occurrence.name).map(statementIndex => ({
    uri: document.uri,
    range: opened.index.variables[statementIndex].range,
  }));
}

/**
 * Highlight every occurrence of the variable under the cursor;
 * assignments count as writes
 */
export function highlights(document: TextDocument, position: Position): DocumentHighlight[] {
  const opened = openDocument(document);
  if (!opened) return [];

  const found = variableAt(opened.index, position.line, position.character);
  if (!found) return [];

  const { name } = found.occurrence;
  const assigned = new Set(
    (opened.analysis.definitions.get(name) ?? []).map(def => def.statementIndex)
  );
  return findReferences(opened.analysis, name).map(statementIndex => ({
    range: opened.index.variables[statementIndex].range,
    kind: assigned.has(statementIndex) ? DocumentHighlightKind.Write : DocumentHighlightKind.Read,
  }));
}

/**
 * Replace the whole document with its formatted form.
 * Documents that do not parse are left alone.
 */
export function formatting(document: TextDocument): TextEdit[] {
  const text = document.getText();
  const result = parse(text);
  if (!result.ok) return [];

  const formatted = format(result.program);
  if (formatted === text) return [];

  return [
    {
      range: {
        start: { line: 0, character: 0 },
        end: { line: document.lineCount, character: 0 },
      },
      newText: formatted,
    },
  ];
}
