import { Range } from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { scanner, Cursor, TokenType } from '@dollarscript/parser';

/**
 * A `$name` outside string literals
 */
export interface VariableOccurrence {
  name: string;
  /** Lexer line, as carried by the AST */
  line: number;
  range: Range;
}

/**
 * Editor positions for what the lexer reports in its own line count.
 *
 * The lexer counts LFCR as one line break and skips newlines inside
 * strings; the editor does neither, so lines are mapped by offset.
 */
export interface DocumentIndex {
  document: TextDocument;
  /** Variables in source order; for a parsed document, one per statement */
  variables: VariableOccurrence[];
  /** Editor line of the first token on each lexer line */
  lines: Map<number, number>;
}

export function createDocument(text: string): TextDocument {
  return TextDocument.create('untitled:document.dls', 'dollarscript', 0, text);
}

/**
 * Replay the scanner over a document the way the parser drives it
 */
export function indexDocument(document: TextDocument): DocumentIndex {
  const lines = new Map<number, number>();
  const variables: VariableOccurrence[] = [];

  const mark = (at: Cursor): void => {
    if (!lines.has(at.line)) {
      lines.set(at.line, document.positionAt(at.offset).line);
    }
  };

  let cursor = scanner.createCursor(document.getText());
  for (;;) {
    const matched = scanner.matchToken(cursor);
    if (!matched.ok) {
      mark(cursor);
      break;
    }

    const { value: token, cursor: after } = matched.value;
    if (token.type !== TokenType.Ignored) mark(cursor);
    if (token.type === TokenType.EOF) break;

    if (token.type === TokenType.VarPrefix) {
      const name = scanner.matchToken(after);
      if (name.ok && name.value.value.type === TokenType.Name) {
        variables.push({
          name: name.value.value.value,
          line: token.line,
          range: {
            start: document.positionAt(cursor.offset),
            end: document.positionAt(name.value.cursor.offset),
          },
        });
      }
    }

    if (token.type === TokenType.Quote) {
      const text = scanner.scanUntilToken(after, '"');
      if (!text.ok) break;
      cursor = scanner.skip(text.value.cursor, 1);
      continue;
    }

    cursor = after;
  }

  return { document, variables, lines };
}

/**
 * Editor line (0-indexed) for a lexer line (1-indexed)
 */
export function documentLine(index: DocumentIndex, line: number): number {
  const exact = index.lines.get(line);
  if (exact !== undefined) return exact;

  // Lines with no token of their own follow the nearest mapped line above
  let nearest: [number, number] | undefined;
  for (const [lexerLine, editorLine] of index.lines) {
    if (lexerLine < line && (!nearest || lexerLine > nearest[0])) {
      nearest = [lexerLine, editorLine];
    }
  }
  return nearest ? nearest[1] + (line - nearest[0]) : line - 1;
}

/**
 * Whole-line range for an editor line
 */
export function lineRange(document: TextDocument, line: number): Range {
  const text = document
    .getText({ start: { line, character: 0 }, end: { line: line + 1, character: 0 } })
    .replace(/\r?\n$|\r$/, '');
  return {
    start: { line, character: 0 },
    end: { line, character: text.length },
  };
}

/**
 * Variable under the cursor, with its index among all occurrences
 */
export function variableAt(
  index: DocumentIndex,
  line: number,
  character: number
): { occurrence: VariableOccurrence; position: number } | undefined {
  const position = index.variables.findIndex(
    v =>
      v.range.start.line === line &&
      v.range.start.character <= character &&
      character <= v.range.end.character
  );
  if (position < 0) return undefined;
  return { occurrence: index.variables[position], position };
}
