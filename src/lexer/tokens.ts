export enum LineKind {
  // No-ops
  COMMENT = 'COMMENT',
  BLANK = 'BLANK',

  // Commands
  ASSIGN = 'ASSIGN',         // Name="value"
  SAY = 'SAY',
  WAIT = 'WAIT',
  PROMPT = 'PROMPT',

  // Block delimiters
  START = 'START',
  END = 'END',
  IF = 'IF',
  ELSE = 'ELSE',
  END_IF = 'END_IF',
  LOOP = 'LOOP',
  END_LOOP = 'END_LOOP',

  // Diagnostics
  UNKNOWN = 'UNKNOWN',
  MALFORMED = 'MALFORMED',   // keyword recognized, argument rejected
}

export const KEYWORDS: Record<string, LineKind> = {
  'start': LineKind.START,
  'end': LineKind.END,
  'say': LineKind.SAY,
  'wait': LineKind.WAIT,
  'prompt': LineKind.PROMPT,
  'if': LineKind.IF,
  'else': LineKind.ELSE,
  'end if': LineKind.END_IF,
  'loop': LineKind.LOOP,
  'end loop': LineKind.END_LOOP,
};

export type ComparisonOp = '==' | '!=';

export interface Comparison {
  /** Template interpolated before comparing; a bare `Var` is stored as `{Var}`. */
  left: string;
  op: ComparisonOp;
  right: string;
}

export type LoopCount = number | 'forever';

interface LineBase {
  /** 1-based source line number. */
  line: number;
  raw: string;
}

export interface CommentLine extends LineBase {
  kind: LineKind.COMMENT;
  text: string;
}

export interface BlankLine extends LineBase {
  kind: LineKind.BLANK;
}

export interface AssignLine extends LineBase {
  kind: LineKind.ASSIGN;
  name: string;
  literal: string;
}

export interface SayLine extends LineBase {
  kind: LineKind.SAY;
  template: string;
}

export interface WaitLine extends LineBase {
  kind: LineKind.WAIT;
  seconds: number;
}

export interface PromptLine extends LineBase {
  kind: LineKind.PROMPT;
  name: string;
  message: string;
}

export interface StartLine extends LineBase {
  kind: LineKind.START;
}

export interface EndLine extends LineBase {
  kind: LineKind.END;
}

export interface IfLine extends LineBase {
  kind: LineKind.IF;
  condition: Comparison;
}

export interface ElseLine extends LineBase {
  kind: LineKind.ELSE;
}

export interface EndIfLine extends LineBase {
  kind: LineKind.END_IF;
}

export interface LoopLine extends LineBase {
  kind: LineKind.LOOP;
  count: LoopCount;
}

export interface EndLoopLine extends LineBase {
  kind: LineKind.END_LOOP;
}

export interface UnknownLine extends LineBase {
  kind: LineKind.UNKNOWN;
  reason?: string;
}

export interface MalformedLine extends LineBase {
  kind: LineKind.MALFORMED;
  keyword: string;
  reason: string;
}

export type ClassifiedLine =
  | CommentLine
  | BlankLine
  | AssignLine
  | SayLine
  | WaitLine
  | PromptLine
  | StartLine
  | EndLine
  | IfLine
  | ElseLine
  | EndIfLine
  | LoopLine
  | EndLoopLine
  | UnknownLine
  | MalformedLine;
