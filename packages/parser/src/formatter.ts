import { NodeType, SourceCodeNode, StatementNode } from './types';

function formatStatement(stmt: StatementNode): string {
  switch (stmt.type) {
    case NodeType.Assignment:
      return `$${stmt.variable.name} = "${stmt.value}"`;
    case NodeType.Print:
      return `print($${stmt.variable.name})`;
  }
}

/**
 * Reprint a program one statement per line
 */
export function format(program: SourceCodeNode): string {
  return program.statements.map(stmt => formatStatement(stmt) + '\n').join('');
}
