import * as fs from 'fs';
import { Command, CommanderError } from 'commander';
import {
  format,
  parse,
  tokenize,
  toDiagnostic,
  Diagnostic,
  DiagnosticSeverity,
  NodeType,
  StatementNode,
} from '@dollarscript/parser';

const ENCODING = 'utf-8';

export interface CliIO {
  readFile(path: string): string;
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliOptions {
  json?: boolean;
  format?: boolean;
  tokens?: boolean;
}

const processIO: CliIO = {
  readFile: (path) => fs.readFileSync(path, ENCODING),
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function describeStatement(stmt: StatementNode): string {
  switch (stmt.type) {
    case NodeType.Assignment:
      return `${stmt.line}: assign $${stmt.variable.name} = "${stmt.value}"`;
    case NodeType.Print:
      return `${stmt.line}: print $${stmt.variable.name}`;
  }
}

function report(io: CliIO, file: string, diagnostics: Diagnostic[]): void {
  for (const diag of diagnostics) {
    const severity = DiagnosticSeverity[diag.severity].toLowerCase();
    io.stderr(`${file}:${diag.line}: ${severity}: ${diag.message}\n`);
  }
}

/**
 * Parse one file and print what was asked for. Returns the exit code.
 */
function runFile(io: CliIO, file: string, options: CliOptions): number {
  let text: string;
  try {
    text = io.readFile(file);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    io.stderr(`${file}: cannot read file: ${message}\n`);
    return 1;
  }

  if (options.tokens) {
    const tokens = tokenize(text);
    if (!tokens.ok) {
      report(io, file, [toDiagnostic(tokens.error)]);
      return 1;
    }
    for (const token of tokens.value) {
      io.stdout(`${token.line}\t${token.type}\t${JSON.stringify(token.value)}\n`);
    }
    return 0;
  }

  const result = parse(text);
  report(io, file, result.diagnostics);
  if (!result.ok) return 1;

  if (options.json) {
    io.stdout(JSON.stringify(result.program, null, 2) + '\n');
  } else if (options.format) {
    io.stdout(format(result.program));
  } else {
    for (const stmt of result.program.statements) {
      io.stdout(describeStatement(stmt) + '\n');
    }
  }
  return 0;
}

export function createProgram(io: CliIO, onExit: (code: number) => void): Command {
  const program = new Command();

  program
    .name('dollarscript')
    .description('Parse a dollarscript file and print its statements')
    .version('0.1.0')
    .argument('<file>', 'source file to parse')
    .option('--json', 'print the syntax tree as JSON')
    .option('--format', 'print the formatted source')
    .option('--tokens', 'print the token stream')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    })
    .action((file: string, options: CliOptions) => {
      onExit(runFile(io, file, options));
    });

  return program;
}

/**
 * Run the command line with user arguments (no node/script prefix)
 */
export function runCli(args: string[], io: CliIO = processIO): number {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });

  try {
    program.parse(args, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }
  return exitCode;
}
