import * as readline from 'readline';

/**
 * Console capabilities a script run needs.
 *
 * The interpreter never touches process.stdout or stdin itself; it goes
 * through a host so the CLI can hand it the real console and tests can
 * hand it a scripted one.
 */
export interface ScriptHost {
  /** Write text exactly as given; callers add their own newlines. */
  write(text: string): void;

  /**
   * Read one line of input.
   * @returns the line without its terminator, or null once input is exhausted
   */
  readLine(): Promise<string | null>;

  /** Resolve after `ms` milliseconds. */
  sleep(ms: number): Promise<void>;

  /** Release input handles. Called once the run is over. */
  close(): void;
}

/** Longest delay a single Node timer honours; longer ones fire after 1 ms. */
export const MAX_TIMER_DELAY = 2 ** 31 - 1;

/**
 * Host bound to the process console.
 * The stdin reader is created on the first prompt, so scripts that never
 * ask for input never hold stdin open.
 */
export class ConsoleHost implements ScriptHost {
  private rl: readline.Interface | null = null;
  private lines: AsyncIterableIterator<string> | null = null;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  write(text: string): void {
    this.output.write(text);
  }

  async readLine(): Promise<string | null> {
    if (!this.lines) {
      this.rl = readline.createInterface({
        input: this.input,
        crlfDelay: Infinity,
        terminal: false,
      });
      this.lines = this.rl[Symbol.asyncIterator]();
    }
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  async sleep(ms: number): Promise<void> {
    let remaining = Math.max(0, ms);
    do {
      const chunk = Math.min(remaining, MAX_TIMER_DELAY);
      await new Promise<void>((resolve) => {
        setTimeout(resolve, chunk);
      });
      remaining -= chunk;
    } while (remaining > 0);
  }

  close(): void {
    if (this.rl) {
      this.rl.close();
      this.rl = null;
      this.lines = null;
    }
  }
}

/**
 * In-memory host for tests and embedding.
 * Input comes from a fixed list of lines; sleeps are recorded, not waited.
 */
export class MemoryHost implements ScriptHost {
  output = '';
  readonly sleeps: number[] = [];
  closed = false;
  private input: string[];

  constructor(input: string[] = []) {
    this.input = [...input];
  }

  write(text: string): void {
    this.output += text;
  }

  async readLine(): Promise<string | null> {
    const line = this.input.shift();
    return line === undefined ? null : line;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
  }

  close(): void {
    this.closed = true;
  }

  /** Output split into lines, without the final empty entry. */
  lines(): string[] {
    const parts = this.output.split('\n');
    if (parts[parts.length - 1] === '') parts.pop();
    return parts;
  }
}
