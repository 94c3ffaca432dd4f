import {
  SourceCodeNode,
  NodeType,
  Diagnostic,
  DiagnosticSeverity,
} from './types';

/**
 * A variable assignment
 */
export interface SymbolDefinition {
  name: string;
  line: number;
  value: string;
  /** Index in the program statements */
  statementIndex: number;
}

/**
 * A variable printed by a print statement
 */
export interface SymbolReference {
  name: string;
  line: number;
  statementIndex: number;
  /** Latest assignment before the print, if any */
  definition?: SymbolDefinition;
}

/**
 * Semantic analysis result
 */
export interface SemanticAnalysis {
  /** Assignments per variable, in statement order */
  definitions: Map<string, SymbolDefinition[]>;
  /** All print references */
  references: SymbolReference[];
  /** Semantic diagnostics */
  diagnostics: Diagnostic[];
}

export interface HoverInfo {
  name: string;
  definition?: SymbolDefinition;
}

/**
 * Analyze a program for variable bindings
 */
export function analyze(program: SourceCodeNode): SemanticAnalysis {
  const definitions = new Map<string, SymbolDefinition[]>();
  const references: SymbolReference[] = [];
  const diagnostics: Diagnostic[] = [];
  const printed = new Set<SymbolDefinition>();

  program.statements.forEach((stmt, index) => {
    const { name } = stmt.variable;

    if (stmt.type === NodeType.Assignment) {
      const defs = definitions.get(name) ?? [];
      defs.push({ name, line: stmt.line, value: stmt.value, statementIndex: index });
      definitions.set(name, defs);
      return;
    }

    const defs = definitions.get(name);
    const definition = defs ? defs[defs.length - 1] : undefined;
    references.push({ name, line: stmt.variable.line, statementIndex: index, definition });

    if (definition) {
      printed.add(definition);
    } else {
      diagnostics.push({
        kind: 'Semantic',
        line: stmt.variable.line,
        message: `Variable '$${name}' is printed before it is assigned`,
        severity: DiagnosticSeverity.Warning,
      });
    }
  });

  // Only the final value of a variable can still be printed later
  for (const defs of definitions.values()) {
    const last = defs[defs.length - 1];
    if (!printed.has(last)) {
      diagnostics.push({
        kind: 'Semantic',
        line: last.line,
        message: `Variable '$${last.name}' is assigned but never printed`,
        severity: DiagnosticSeverity.Information,
      });
    }
  }

  diagnostics.sort((a, b) => a.line - b.line);
  return { definitions, references, diagnostics };
}

/**
 * The assignment or print of the statement at the given index
 */
export function symbolAt(
  analysis: SemanticAnalysis,
  statementIndex: number
): SymbolDefinition | SymbolReference | undefined {
  const ref = analysis.references.find(r => r.statementIndex === statementIndex);
  if (ref) return ref;

  for (const defs of analysis.definitions.values()) {
    const def = defs.find(d => d.statementIndex === statementIndex);
    if (def) return def;
  }
  return undefined;
}

/**
 * Find the assignment the variable of a statement refers to.
 * An assignment is its own definition.
 */
export function findDefinitionAt(
  analysis: SemanticAnalysis,
  statementIndex: number
): SymbolDefinition | undefined {
  const ref = analysis.references.find(r => r.statementIndex === statementIndex);
  if (ref) return ref.definition;

  const symbol = symbolAt(analysis, statementIndex);
  return symbol && 'value' in symbol ? symbol : undefined;
}

/**
 * Indexes of the statements assigning or printing a variable, in order
 */
export function findReferences(analysis: SemanticAnalysis, name: string): number[] {
  const indexes: number[] = [];
  for (const def of analysis.definitions.get(name) ?? []) {
    indexes.push(def.statementIndex);
  }
  for (const ref of analysis.references) {
    if (ref.name === name) indexes.push(ref.statementIndex);
  }
  return indexes.sort((a, b) => a - b);
}

/**
 * Variables assigned on lines before the given one, latest assignment each
 */
export function getCompletions(analysis: SemanticAnalysis, line: number): SymbolDefinition[] {
  const completions: SymbolDefinition[] = [];

  for (const defs of analysis.definitions.values()) {
    const visible = defs.filter(def => def.line < line);
    if (visible.length > 0) {
      completions.push(visible[visible.length - 1]);
    }
  }

  return completions.sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Get hover information for the variable of a statement
 */
export function getHoverInfo(
  analysis: SemanticAnalysis,
  statementIndex: number
): HoverInfo | undefined {
  const symbol = symbolAt(analysis, statementIndex);
  if (!symbol) return undefined;

  return { name: symbol.name, definition: findDefinitionAt(analysis, statementIndex) };
}
