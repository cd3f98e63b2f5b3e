import { Comparison, LoopCount } from '../lexer/tokens';

export { Comparison, ComparisonOp, LoopCount } from '../lexer/tokens';

export type Command =
  | Assign
  | Say
  | Wait
  | Prompt
  | Comment
  | Blank
  | Unknown;

/** Blocks that may appear inside a body. `Script` only ever sits at the root. */
export type Node = Command | IfElse | Loop;

export type Block = Script | IfElse | Loop;

export interface Position {
  line: number;
}

export interface BaseNode {
  position: Position;
}

export interface Program {
  type: 'Program';
  script: Script;
  /** Lines found outside `start … end`. They never execute. */
  ignored: IgnoredLine[];
}

export interface IgnoredLine {
  line: number;
  raw: string;
  reason: 'before-start' | 'after-end';
}

// ─── Blocks ────────────────────────────────────────────

export interface Script extends BaseNode {
  type: 'Script';
  body: Node[];
  endLine: number;
}

export interface IfElse extends BaseNode {
  type: 'IfElse';
  condition: Comparison;
  thenBody: Node[];
  elseBody: Node[];
  hasElse: boolean;
}

export interface Loop extends BaseNode {
  type: 'Loop';
  count: LoopCount;
  body: Node[];
}

// ─── Commands ──────────────────────────────────────────

export interface Assign extends BaseNode {
  type: 'Assign';
  name: string;
  literal: string;
}

export interface Say extends BaseNode {
  type: 'Say';
  template: string;
}

export interface Wait extends BaseNode {
  type: 'Wait';
  seconds: number;
}

export interface Prompt extends BaseNode {
  type: 'Prompt';
  name: string;
  message: string;
}

export interface Comment extends BaseNode {
  type: 'Comment';
  text: string;
}

export interface Blank extends BaseNode {
  type: 'Blank';
}

export interface Unknown extends BaseNode {
  type: 'Unknown';
  raw: string;
  reason?: string;
}
