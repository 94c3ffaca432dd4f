// Types
export * from './types';

// Errors
export { errorChain, toDiagnostic } from './errors';

// Lexer
export { Lexer, tokenize } from './lexer';
export * as scanner from './scanner';

// Parser
export { Parser, parse } from './parser';

// Formatting
export { format } from './formatter';

// Semantic analysis
export {
  analyze,
  findDefinitionAt,
  findReferences,
  symbolAt,
  getCompletions,
  getHoverInfo,
  type HoverInfo,
  type SymbolDefinition,
  type SymbolReference,
  type SemanticAnalysis,
} from './semantics';
