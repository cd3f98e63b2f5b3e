import { ClassifiedLine, LineKind } from '../lexer/tokens';
import { ParseError } from '../errors';
import * as AST from './ast';

type Frame =
  | { kind: 'script'; node: AST.Script; target: AST.Node[] }
  | { kind: 'if'; node: AST.IfElse; target: AST.Node[] }
  | { kind: 'loop'; node: AST.Loop; target: AST.Node[] };

type FrameKind = Frame['kind'];

const OPENERS: Record<FrameKind, string> = {
  script: 'start',
  if: 'if',
  loop: 'loop',
};

const TERMINATORS: Record<FrameKind, string> = {
  script: 'end',
  if: 'end if',
  loop: 'end loop',
};

/**
 * Builds the block tree from classified lines.
 *
 * Open blocks live on an explicit stack rather than the call stack, so
 * nesting depth is bounded only by memory. Every structural problem is
 * raised as a ParseError before the caller gets a tree to execute.
 */
export class Parser {
  private stack: Frame[] = [];
  private ignored: AST.IgnoredLine[] = [];
  private script: AST.Script | null = null;
  private closed = false;

  parse(lines: ClassifiedLine[]): AST.Program {
    this.stack = [];
    this.ignored = [];
    this.script = null;
    this.closed = false;

    for (const line of lines) {
      this.consume(line);
    }

    if (this.stack.length > 0) {
      const open = this.top();
      const opened = open.node.position.line;
      throw new ParseError(
        `Unterminated '${OPENERS[open.kind]}' block opened at line ${opened}: ` +
        `expected '${TERMINATORS[open.kind]}' before end of input`,
        opened,
        TERMINATORS[open.kind],
        'end of input',
      );
    }

    if (!this.script) {
      const last = lines.length > 0 ? lines[lines.length - 1].line : 1;
      throw new ParseError(`Script has no 'start' block`, last, 'start', 'end of input');
    }

    return { type: 'Program', script: this.script, ignored: this.ignored };
  }

  private consume(line: ClassifiedLine): void {
    const outside = this.script === null || this.closed;
    if (outside) {
      if (this.script === null && line.kind === LineKind.START) {
        this.openScript(line.line);
      } else if (line.kind !== LineKind.BLANK && line.kind !== LineKind.COMMENT) {
        this.ignored.push({
          line: line.line,
          raw: line.raw,
          reason: this.closed ? 'after-end' : 'before-start',
        });
      }
      return;
    }

    const position = { line: line.line };

    switch (line.kind) {
      // ─── Block delimiters ─────────────────────────────

      case LineKind.START:
        throw new ParseError(
          `Unexpected 'start' at line ${line.line}: the script opened at line ${this.stack[0].node.position.line} is still open`,
          line.line,
        );

      case LineKind.END:
        this.close('script', line.line, 'end');
        return;

      case LineKind.END_IF:
        this.close('if', line.line, 'end if');
        return;

      case LineKind.END_LOOP:
        this.close('loop', line.line, 'end loop');
        return;

      case LineKind.IF: {
        const node: AST.IfElse = {
          type: 'IfElse',
          condition: line.condition,
          thenBody: [],
          elseBody: [],
          hasElse: false,
          position,
        };
        this.top().target.push(node);
        this.stack.push({ kind: 'if', node, target: node.thenBody });
        return;
      }

      case LineKind.ELSE: {
        const frame = this.top();
        if (frame.kind !== 'if') {
          throw new ParseError(
            `'else' at line ${line.line} has no matching 'if'`,
            line.line,
            TERMINATORS[frame.kind],
            'else',
          );
        }
        if (frame.node.hasElse) {
          throw new ParseError(
            `Duplicate 'else' at line ${line.line} for the 'if' opened at line ${frame.node.position.line}`,
            line.line,
            'end if',
            'else',
          );
        }
        frame.node.hasElse = true;
        frame.target = frame.node.elseBody;
        return;
      }

      case LineKind.LOOP: {
        const node: AST.Loop = { type: 'Loop', count: line.count, body: [], position };
        this.top().target.push(node);
        this.stack.push({ kind: 'loop', node, target: node.body });
        return;
      }

      case LineKind.MALFORMED:
        throw new ParseError(`${line.reason} at line ${line.line}: ${line.raw.trim()}`, line.line);

      // ─── Commands ─────────────────────────────────────

      case LineKind.ASSIGN:
        this.append({ type: 'Assign', name: line.name, literal: line.literal, position });
        return;

      case LineKind.SAY:
        this.append({ type: 'Say', template: line.template, position });
        return;

      case LineKind.WAIT:
        this.append({ type: 'Wait', seconds: line.seconds, position });
        return;

      case LineKind.PROMPT:
        this.append({ type: 'Prompt', name: line.name, message: line.message, position });
        return;

      case LineKind.COMMENT:
        this.append({ type: 'Comment', text: line.text, position });
        return;

      case LineKind.BLANK:
        this.append({ type: 'Blank', position });
        return;

      case LineKind.UNKNOWN:
        this.append(
          line.reason === undefined
            ? { type: 'Unknown', raw: line.raw, position }
            : { type: 'Unknown', raw: line.raw, reason: line.reason, position },
        );
        return;
    }
  }

  private openScript(line: number): void {
    const script: AST.Script = { type: 'Script', body: [], endLine: line, position: { line } };
    this.script = script;
    this.stack.push({ kind: 'script', node: script, target: script.body });
  }

  private close(kind: FrameKind, line: number, found: string): void {
    const frame = this.top();
    if (frame.kind !== kind) {
      throw new ParseError(
        `Mismatched terminator at line ${line}: expected '${TERMINATORS[frame.kind]}' ` +
        `for the '${OPENERS[frame.kind]}' opened at line ${frame.node.position.line}, found '${found}'`,
        line,
        TERMINATORS[frame.kind],
        found,
      );
    }
    this.stack.pop();
    if (frame.kind === 'script') {
      frame.node.endLine = line;
      this.closed = true;
    }
  }

  private append(node: AST.Node): void {
    this.top().target.push(node);
  }

  private top(): Frame {
    return this.stack[this.stack.length - 1];
  }
}
