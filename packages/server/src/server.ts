#!/usr/bin/env node

import {
  createConnection,
  TextDocuments,
  ProposedFeatures,
  InitializeResult,
  TextDocumentSyncKind,
  CompletionItem,
  TextDocumentPositionParams,
  Location,
  Hover,
  DocumentHighlight,
  DocumentFormattingParams,
  TextEdit,
} from 'vscode-languageserver/node';

import { TextDocument } from 'vscode-languageserver-textdocument';

import {
  completions,
  computeDiagnostics,
  definition,
  formatting,
  highlights,
  hover,
  references,
} from './features';

// Create connection using stdio
const connection = createConnection(ProposedFeatures.all);

// Document manager
const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

connection.onInitialize((): InitializeResult => {
  return {
    capabilities: {
      textDocumentSync: TextDocumentSyncKind.Incremental,
      completionProvider: {
        triggerCharacters: ['$'],
      },
      hoverProvider: true,
      definitionProvider: true,
      referencesProvider: true,
      documentHighlightProvider: true,
      documentFormattingProvider: true,
    },
  };
});

connection.onInitialized(() => {
  connection.console.log('dollarscript language server initialized');
});

documents.onDidChangeContent((change) => {
  validateDocument(change.document);
});

documents.onDidClose((event) => {
  publish(event.document.uri, []);
});

/**
 * Parse and validate a document
 */
function validateDocument(document: TextDocument): void {
  const diagnostics = computeDiagnostics(document);
  publish(document.uri, diagnostics);
}

function publish(uri: string, diagnostics: ReturnType<typeof computeDiagnostics>): void {
  connection.sendDiagnostics({ uri, diagnostics }).catch((err: unknown) => {
    connection.console.error(`Could not publish diagnostics for ${uri}: ${String(err)}`);
  });
}

connection.onCompletion((params: TextDocumentPositionParams): CompletionItem[] => {
  const document = documents.get(params.textDocument.uri);
  if (!document) return [];
  return completions(document, params.position);
});

connection.onHover((params: TextDocumentPositionParams): Hover | null => {
  const document = documents.get(params.textDocument.uri);
  if (!document) return null;
  return hover(document, params.position);
});

connection.onDefinition((params: TextDocumentPositionParams): Location | null => {
  const document = documents.get(params.textDocument.uri);
  if (!document) return null;
  return definition(document, params.position);
});

connection.onReferences((params): Location[] => {
  const document = documents.get(params.textDocument.uri);
  if (!document) return [];
  return references(document, params.position);
});

connection.onDocumentHighlight((params: TextDocumentPositionParams): DocumentHighlight[] => {
  const document = documents.get(params.textDocument.uri);
  if (!document) return [];
  return highlights(document, params.position);
});

connection.onDocumentFormatting((params: DocumentFormattingParams): TextEdit[] => {
  const document = documents.get(params.textDocument.uri);
  if (!document) return [];

  const edits = formatting(document);
  if (edits.length === 0) {
    connection.console.log(`Nothing to format in ${params.textDocument.uri}`);
  }
  return edits;
});

// Listen for document changes
documents.listen(connection);

// Start the connection
connection.listen();
