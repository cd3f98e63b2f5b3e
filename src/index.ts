export { Lexer, classifyLine, cleanLiteral } from './lexer/lexer';
export { LineKind, ClassifiedLine, Comparison, ComparisonOp, LoopCount } from './lexer/tokens';
export { Parser } from './parser/parser';
export * as AST from './parser/ast';
export { IndyError, ParseError } from './errors';
export { Interpreter, InterpreterOptions, DEFAULT_PROMPT_SEPARATOR } from './runtime/interpreter';
export { Environment } from './runtime/environment';
export { interpolate } from './runtime/interpolate';
export { ScriptHost, ConsoleHost, MemoryHost } from './runtime/host';
export {
  Diagnostic,
  DiagnosticLevel,
  DiagnosticsSink,
  ConsoleDiagnostics,
  SilentDiagnostics,
  MemoryDiagnostics,
  formatDiagnostic,
} from './runtime/diagnostics';
export { IndyConfig, loadConfig, loadConfigForScript } from './runtime/config';

import { Lexer } from './lexer/lexer';
import { ClassifiedLine } from './lexer/tokens';
import { Parser } from './parser/parser';
import * as AST from './parser/ast';
import { IndyError } from './errors';
import { Interpreter } from './runtime/interpreter';
import { ConsoleHost, ScriptHost } from './runtime/host';
import { DiagnosticsSink } from './runtime/diagnostics';

export interface ExecuteOptions {
  /** Console to run against. Defaults to the process console. */
  host?: ScriptHost;
  diagnostics?: DiagnosticsSink;
  verbose?: boolean;
  promptSeparator?: string;
  trimInput?: boolean;
}

export type RunResult =
  | { status: 'completed'; variables: Record<string, string> }
  | { status: 'failed'; error: IndyError };

/**
 * Classify every line of an Indy source string.
 */
export function tokenize(source: string): ClassifiedLine[] {
  return new Lexer(source).tokenize();
}

/**
 * Parse an Indy source string into a block tree.
 * Throws ParseError on structural problems.
 */
export function parse(source: string): AST.Program {
  const parser = new Parser();
  return parser.parse(tokenize(source));
}

/**
 * Parse and run an Indy source string.
 *
 * Parse errors come back as a failed result before the host sees any
 * output. The host is closed once the run is over, whatever the outcome.
 */
export async function execute(source: string, options: ExecuteOptions = {}): Promise<RunResult> {
  const host = options.host ?? new ConsoleHost();
  try {
    const program = parse(source);
    const interpreter = new Interpreter({ ...options, host });
    const env = await interpreter.run(program);
    return { status: 'completed', variables: env.snapshot() };
  } catch (error) {
    if (error instanceof IndyError) {
      return { status: 'failed', error };
    }
    throw error;
  } finally {
    host.close();
  }
}
