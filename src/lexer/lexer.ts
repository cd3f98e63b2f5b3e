import { ClassifiedLine, Comparison, ComparisonOp, KEYWORDS, LineKind } from './tokens';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
// `=` must not be the first half of `==`, so `X == "y"` stays unrecognized
const ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)\s*=(?!=)(.*)$/;
const DECIMAL = /^(?:\d+(?:\.\d*)?|\.\d+)$/;
const INTEGER = /^\d+$/;

/**
 * Splits Indy source into lines and classifies each one.
 * Classification never throws: lines it cannot make sense of come back
 * as UNKNOWN or MALFORMED and the parser decides what to do with them.
 */
export class Lexer {
  private source: string;

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): ClassifiedLine[] {
    let text = this.source;
    if (text.charCodeAt(0) === 0xfeff) {
      text = text.slice(1);
    }
    if (text.length === 0) return [];

    const rawLines = text.split('\n');
    // A trailing newline terminates the last line; it does not start a new one
    if (rawLines[rawLines.length - 1] === '') {
      rawLines.pop();
    }

    return rawLines.map((raw, index) =>
      classifyLine(raw.endsWith('\r') ? raw.slice(0, -1) : raw, index + 1),
    );
  }
}

/**
 * Classify a single source line. Rules apply in priority order:
 * comment, blank, assignment, keyword, unknown.
 */
export function classifyLine(raw: string, line: number): ClassifiedLine {
  const trimmed = raw.trim();

  if (trimmed.startsWith('#')) {
    return { kind: LineKind.COMMENT, text: trimmed.slice(1).trim(), line, raw };
  }

  if (trimmed === '') {
    return { kind: LineKind.BLANK, line, raw };
  }

  const assignment = ASSIGNMENT.exec(trimmed);
  if (assignment) {
    return { kind: LineKind.ASSIGN, name: assignment[1], literal: cleanLiteral(assignment[2]), line, raw };
  }

  const keyword = trimmed.split(/\s+/)[0];
  if (!(keyword in KEYWORDS)) {
    return unknown(raw, line);
  }
  const rest = trimmed.slice(keyword.length).trim();

  switch (keyword) {
    case 'start':
      return rest === ''
        ? { kind: LineKind.START, line, raw }
        : unknown(raw, line, `'start' takes no arguments`);

    case 'end':
      if (rest === '') return { kind: LineKind.END, line, raw };
      if (rest === 'if') return { kind: LineKind.END_IF, line, raw };
      if (rest === 'loop') return { kind: LineKind.END_LOOP, line, raw };
      return unknown(raw, line, `'end' must be followed by nothing, 'if' or 'loop'`);

    case 'else':
      return rest === ''
        ? { kind: LineKind.ELSE, line, raw }
        : unknown(raw, line, `'else' takes no arguments`);

    case 'say':
      return { kind: LineKind.SAY, template: cleanLiteral(rest), line, raw };

    case 'wait':
      if (rest === '') {
        return malformed(raw, line, 'wait', `'wait' requires a duration in seconds`);
      }
      if (!DECIMAL.test(rest)) {
        return malformed(raw, line, 'wait', `Invalid duration for 'wait': "${rest}" is not a number of seconds`);
      }
      if (!Number.isFinite(parseFloat(rest))) {
        return malformed(raw, line, 'wait', `Invalid duration for 'wait': "${rest}" is too large`);
      }
      return { kind: LineKind.WAIT, seconds: parseFloat(rest), line, raw };

    case 'prompt':
      return classifyPrompt(rest, raw, line);

    case 'if': {
      const condition = parseCondition(rest);
      if (!condition) {
        return malformed(raw, line, 'if', `Invalid condition "${rest}": use VAR == "value" or VAR != "value"`);
      }
      return { kind: LineKind.IF, condition, line, raw };
    }

    case 'loop':
      if (rest === 'forever') {
        return { kind: LineKind.LOOP, count: 'forever', line, raw };
      }
      if (!INTEGER.test(rest)) {
        return malformed(raw, line, 'loop', `Invalid count for 'loop': "${rest}" is neither a whole number nor 'forever'`);
      }
      if (!Number.isSafeInteger(parseInt(rest, 10))) {
        return malformed(raw, line, 'loop', `Invalid count for 'loop': "${rest}" is too large`);
      }
      return { kind: LineKind.LOOP, count: parseInt(rest, 10), line, raw };

    default:
      return unknown(raw, line);
  }
}

/**
 * Trim a literal and drop one pair of surrounding double quotes.
 * Nothing inside the quotes is unescaped.
 */
export function cleanLiteral(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

function classifyPrompt(rest: string, raw: string, line: number): ClassifiedLine {
  const eq = rest.indexOf('=');
  if (eq === -1) {
    return unknown(raw, line, `'prompt' syntax is incorrect, use: prompt VAR="Message"`);
  }
  const name = rest.slice(0, eq).trim();
  if (!IDENTIFIER.test(name)) {
    return unknown(raw, line, `'${name}' is not a valid variable name`);
  }
  return { kind: LineKind.PROMPT, name, message: cleanLiteral(rest.slice(eq + 1)), line, raw };
}

function parseCondition(text: string): Comparison | null {
  const eq = text.indexOf('==');
  const ne = text.indexOf('!=');
  if (eq === -1 && ne === -1) return null;

  const useEq = ne === -1 || (eq !== -1 && eq < ne);
  const index = useEq ? eq : ne;
  const op: ComparisonOp = useEq ? '==' : '!=';

  const left = text.slice(0, index).trim();
  if (left === '') return null;

  return {
    left: IDENTIFIER.test(left) ? `{${left}}` : cleanLiteral(left),
    op,
    right: cleanLiteral(text.slice(index + 2)),
  };
}

function unknown(raw: string, line: number, reason?: string): ClassifiedLine {
  return reason === undefined
    ? { kind: LineKind.UNKNOWN, line, raw }
    : { kind: LineKind.UNKNOWN, reason, line, raw };
}

function malformed(raw: string, line: number, keyword: string, reason: string): ClassifiedLine {
  return { kind: LineKind.MALFORMED, keyword, reason, line, raw };
}
