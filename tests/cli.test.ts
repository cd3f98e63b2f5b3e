/**
 * CLI tests
 *
 * Runs .indy fixture files through main(): arguments → config → lexer →
 * parser → interpreter → console. Console output is captured with spies.
 */

import * as path from 'path';
import { main, VERSION } from '../src/cli';

const FIXTURES = path.resolve(__dirname, 'fixtures');

function fixture(name: string): string {
  return path.join(FIXTURES, name);
}

describe('CLI', () => {
  let stdout: string;
  let stderr: string;

  beforeEach(() => {
    stdout = '';
    stderr = '';
    jest.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      stdout += args.join(' ') + '\n';
    });
    jest.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      stderr += args.join(' ') + '\n';
    });
    jest.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout += chunk.toString();
      return true;
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('basic execution', () => {
    it('should run hello.indy and print its output after the banner', async () => {
      const code = await main([fixture('hello.indy')]);
      expect(code).toBe(0);
      expect(stdout).toBe(`--- Indy-lang Interpreter v${VERSION} ---\nHello, World!\nDone\n`);
    });

    it('should omit the banner with --quiet', async () => {
      const code = await main(['--quiet', fixture('hello.indy')]);
      expect(code).toBe(0);
      expect(stdout).toBe('Hello, World!\nDone\n');
    });

    it('should show usage with --help', async () => {
      const code = await main(['--help']);
      expect(code).toBe(0);
      expect(stdout).toContain('Usage:');
    });

    it('should show usage with no args', async () => {
      const code = await main([]);
      expect(code).toBe(0);
      expect(stdout).toContain('Usage:');
    });

    it('should print the version', async () => {
      const code = await main(['--version']);
      expect(code).toBe(0);
      expect(stdout).toBe(`indy ${VERSION}\n`);
    });

    it('should error on missing file', async () => {
      const code = await main(['nonexistent.indy']);
      expect(code).toBe(1);
      expect(stderr).toBe(`Error: File not found: ${path.resolve('nonexistent.indy')}\n`);
    });

    it('should error when only flags are given', async () => {
      const code = await main(['--verbose']);
      expect(code).toBe(1);
      expect(stderr).toBe('Error: No input file specified.\n');
    });
  });

  describe('control flow', () => {
    it('should branch, skip loops and report diagnostics under --verbose', async () => {
      const code = await main(['--quiet', '--verbose', fixture('branching.indy')]);
      expect(code).toBe(0);
      expect(stdout).toBe([
        '[Indy Engine] Script started. (line 1)',
        'Glad to hear it',
        '[Indy Engine] Loop encountered (forever). Simulation: skipping block to continue execution. (line 8)',
        'after',
        '[Indy Engine] Script finished. (line 13)',
        '',
      ].join('\n'));
      expect(stderr).toBe("[Indy Engine] Unknown command or bad syntax: 'dance wildly' (line 11)\n");
    });

    it('should stay quiet about unknown lines without --verbose', async () => {
      const code = await main(['--quiet', fixture('branching.indy')]);
      expect(code).toBe(0);
      expect(stdout).toBe('Glad to hear it\nafter\n');
      expect(stderr).toBe('');
    });
  });

  describe('errors', () => {
    it('should exit non-zero on a structural error without running anything', async () => {
      const code = await main(['--quiet', fixture('unterminated.indy')]);
      expect(code).toBe(1);
      expect(stdout).toBe('');
      expect(stderr).toBe(
        "Error: ParseError: Mismatched terminator at line 5: expected 'end if' for the 'if' opened at line 3, found 'end'\n",
      );
    });
  });

  describe('configuration', () => {
    it('should apply indy.config.json next to the script', async () => {
      const code = await main([fixture('configured/loops.indy')]);
      expect(code).toBe(0);
      expect(stdout).toBe([
        '[Indy Engine] Script started. (line 1)',
        '[Indy Engine] Loop encountered (2 times). Simulation: skipping block to continue execution. (line 2)',
        'outside',
        '[Indy Engine] Script finished. (line 6)',
        '',
      ].join('\n'));
    });

    it('should report an unreadable --config file', async () => {
      const missing = fixture('missing.config.json');
      const code = await main(['--config', missing, fixture('hello.indy')]);
      expect(code).toBe(1);
      expect(stderr).toContain('Error: ENOENT');
    });
  });

  describe('inspection modes', () => {
    it('should print classified lines with --lex', async () => {
      const code = await main(['--lex', fixture('hello.indy')]);
      expect(code).toBe(0);
      expect(stdout.split('\n').slice(0, 4)).toEqual([
        '1\tCOMMENT {"text":"Greeting without any input"}',
        '2\tSTART',
        '3\tASSIGN {"name":"Name","literal":"World"}',
        '4\tSAY {"template":"Hello, {Name}!"}',
      ]);
    });

    it('should print the block tree with --parse', async () => {
      const code = await main(['--parse', fixture('hello.indy')]);
      expect(code).toBe(0);
      const program = JSON.parse(stdout);
      expect(program.type).toBe('Program');
      expect(program.script.body.map((n: { type: string }) => n.type)).toEqual(['Assign', 'Say', 'Wait', 'Say']);
    });

    it('should report parse errors with --parse', async () => {
      const code = await main(['--parse', fixture('unterminated.indy')]);
      expect(code).toBe(1);
      expect(stderr).toContain('Mismatched terminator at line 5');
    });
  });
});
