/**
 * Diagnostics: verbose engine messages.
 *
 * The interpreter only reports when verbose mode is on; where the
 * messages go is up to the sink it was given.
 */

export type DiagnosticLevel = 'info' | 'warning';

export interface Diagnostic {
  level: DiagnosticLevel;
  message: string;
  /** Source line the message is about, if any. */
  line?: number;
}

export interface DiagnosticsSink {
  report(diagnostic: Diagnostic): void;
}

const PREFIX = '[Indy Engine]';

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = diagnostic.line !== undefined ? ` (line ${diagnostic.line})` : '';
  return `${PREFIX} ${diagnostic.message}${where}`;
}

/**
 * Writes info messages to stdout and warnings to stderr, so piping a
 * script's output keeps engine complaints visible.
 */
export class ConsoleDiagnostics implements DiagnosticsSink {
  report(diagnostic: Diagnostic): void {
    const text = formatDiagnostic(diagnostic);
    if (diagnostic.level === 'warning') {
      console.error(text);
    } else {
      console.log(text);
    }
  }
}

export class SilentDiagnostics implements DiagnosticsSink {
  report(_diagnostic: Diagnostic): void {}
}

/** Keeps every diagnostic in order. */
export class MemoryDiagnostics implements DiagnosticsSink {
  readonly entries: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.entries.push(diagnostic);
  }

  messages(): string[] {
    return this.entries.map(d => d.message);
  }
}
