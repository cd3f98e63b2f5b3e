import * as AST from '../parser/ast';
import { Environment } from './environment';
import { interpolate } from './interpolate';
import { ScriptHost } from './host';
import { DiagnosticLevel, DiagnosticsSink, SilentDiagnostics } from './diagnostics';

export const DEFAULT_PROMPT_SEPARATOR = ': ';

export interface InterpreterOptions {
  host: ScriptHost;
  /** Where verbose messages go. Nothing is reported unless `verbose` is set. */
  diagnostics?: DiagnosticsSink;
  verbose?: boolean;
  promptSeparator?: string;
  /** Trim prompt answers. By default only the line terminator is removed. */
  trimInput?: boolean;
}

/**
 * Executes a parsed Indy program.
 *
 * Nodes run strictly one after another: each is awaited to completion,
 * nested blocks included, before the next one starts. Runtime problems
 * (unknown lines, undefined variables, exhausted input) never throw;
 * they only show up as verbose diagnostics.
 */
export class Interpreter {
  private host: ScriptHost;
  private diagnostics: DiagnosticsSink;
  private verbose: boolean;
  private promptSeparator: string;
  private trimInput: boolean;
  private env: Environment = new Environment();

  constructor(options: InterpreterOptions) {
    this.host = options.host;
    this.diagnostics = options.diagnostics ?? new SilentDiagnostics();
    this.verbose = options.verbose ?? false;
    this.promptSeparator = options.promptSeparator ?? DEFAULT_PROMPT_SEPARATOR;
    this.trimInput = options.trimInput ?? false;
  }

  get environment(): Environment {
    return this.env;
  }

  async run(program: AST.Program): Promise<Environment> {
    const before = program.ignored.filter(l => l.reason === 'before-start');
    const after = program.ignored.filter(l => l.reason === 'after-end');

    for (const ignored of before) {
      this.report(`Ignoring line before 'start': '${ignored.raw.trim()}'`, ignored.line);
    }

    this.report('Script started.', program.script.position.line);
    await this.executeBody(program.script.body);
    this.report('Script finished.', program.script.endLine);

    for (const ignored of after) {
      this.report(`Ignoring line after 'end': '${ignored.raw.trim()}'`, ignored.line);
    }

    return this.env;
  }

  async executeBody(body: AST.Node[]): Promise<void> {
    for (const node of body) {
      await this.execute(node);
    }
  }

  // ─── Node Execution ────────────────────────────────────

  async execute(node: AST.Node): Promise<void> {
    switch (node.type) {
      case 'Assign':
        this.env.set(node.name, interpolate(node.literal, this.env));
        return;
      case 'Say':
        this.host.write(interpolate(node.template, this.env) + '\n');
        return;
      case 'Wait':
        return this.executeWait(node);
      case 'Prompt':
        return this.executePrompt(node);
      case 'IfElse':
        return this.executeIf(node);
      case 'Loop':
        return this.executeLoop(node);
      case 'Unknown': {
        const reason = node.reason ? ` (${node.reason})` : '';
        this.report(`Unknown command or bad syntax: '${node.raw.trim()}'${reason}`, node.position.line, 'warning');
        return;
      }
      case 'Comment':
      case 'Blank':
        return;
    }
  }

  private async executeWait(node: AST.Wait): Promise<void> {
    this.report(`Waiting for ${node.seconds} seconds...`, node.position.line);
    await this.host.sleep(node.seconds * 1000);
  }

  private async executePrompt(node: AST.Prompt): Promise<void> {
    const message = interpolate(node.message, this.env);
    this.host.write(`${message}${this.promptSeparator}`);

    const answer = await this.host.readLine();
    if (answer === null) {
      this.report(`No input left for prompt '${node.name}'; storing an empty value.`, node.position.line, 'warning');
      this.env.set(node.name, '');
      return;
    }

    this.env.set(node.name, this.trimInput ? answer.trim() : answer);
  }

  private async executeIf(node: AST.IfElse): Promise<void> {
    if (this.evaluateCondition(node.condition)) {
      await this.executeBody(node.thenBody);
    } else {
      await this.executeBody(node.elseBody);
    }
  }

  /**
   * Loops are recognized but not iterated: the body is skipped and
   * execution resumes with the next sibling.
   */
  private async executeLoop(node: AST.Loop): Promise<void> {
    const count = node.count === 'forever' ? 'forever' : `${node.count} time${node.count === 1 ? '' : 's'}`;
    this.report(
      `Loop encountered (${count}). Simulation: skipping block to continue execution.`,
      node.position.line,
    );
  }

  /** Exact string comparison after interpolating the left side. */
  evaluateCondition(condition: AST.Comparison): boolean {
    const left = interpolate(condition.left, this.env);
    switch (condition.op) {
      case '==':
        return left === condition.right;
      case '!=':
        return left !== condition.right;
    }
  }

  private report(message: string, line?: number, level: DiagnosticLevel = 'info'): void {
    if (!this.verbose) return;
    this.diagnostics.report(line === undefined ? { level, message } : { level, message, line });
  }
}
