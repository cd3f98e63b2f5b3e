#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Lexer } from './lexer/lexer';
import { Parser } from './parser/parser';
import { execute } from './index';
import { ConsoleHost } from './runtime/host';
import { ConsoleDiagnostics } from './runtime/diagnostics';
import { IndyConfig, loadConfig, loadConfigForScript } from './runtime/config';

export const VERSION = '0.5.2';

const USAGE = `
indy - The Indy-lang Interpreter v${VERSION}

Usage:
  indy <file.indy>            Run an Indy script
  indy --parse <file.indy>    Parse and print the block tree
  indy --lex <file.indy>      Classify and print each source line
  indy --help                 Show this help message
  indy --version              Print the interpreter version

Options:
  --verbose                   Report engine diagnostics (loops skipped, unknown lines, waits)
  --quiet                     Do not print the version banner
  --config <path>             Path to indy.config.json (auto-detected by default)

Configuration:
  indy.config.json or .indyrc.json, next to the script or in the working
  directory, may set "verbose", "promptSeparator", "trimInput" and "banner".

Examples:
  indy examples/greeting.indy
  indy --verbose examples/greeting.indy
  indy --parse examples/greeting.indy
`;

function getArg(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Run the CLI with the given arguments (without node and script path).
 * @returns the process exit code
 */
export async function main(args: string[]): Promise<number> {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    return 0;
  }

  if (args.includes('--version')) {
    console.log(`indy ${VERSION}`);
    return 0;
  }

  const flags = new Set(args.filter(a => a.startsWith('--')));
  const flagsWithValues = new Set(['--config']);
  const files: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      if (flagsWithValues.has(args[i])) i++;
      continue;
    }
    files.push(args[i]);
  }

  if (files.length === 0) {
    console.error('Error: No input file specified.');
    console.log(USAGE);
    return 1;
  }

  const filePath = path.resolve(files[0]);

  if (!fs.existsSync(filePath)) {
    console.error(`Error: File not found: ${filePath}`);
    return 1;
  }

  const source = fs.readFileSync(filePath, 'utf-8');

  // Lex-only mode
  if (flags.has('--lex')) {
    for (const { kind, line, raw: _raw, ...fields } of new Lexer(source).tokenize()) {
      const detail = Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
      console.log(`${line}\t${kind}${detail}`);
    }
    return 0;
  }

  // Parse-only mode
  if (flags.has('--parse')) {
    try {
      const program = new Parser().parse(new Lexer(source).tokenize());
      console.log(JSON.stringify(program, null, 2));
    } catch (e) {
      console.error(`Error: ${errorMessage(e)}`);
      return 1;
    }
    return 0;
  }

  let config: IndyConfig;
  try {
    const explicit = getArg(args, '--config');
    config = explicit ? loadConfig(explicit) : loadConfigForScript(filePath);
  } catch (e) {
    console.error(`Error: ${errorMessage(e)}`);
    return 1;
  }

  const verbose = flags.has('--verbose') || config.verbose === true;
  if (!flags.has('--quiet') && config.banner !== false) {
    console.log(`--- Indy-lang Interpreter v${VERSION} ---`);
  }

  const result = await execute(source, {
    host: new ConsoleHost(),
    diagnostics: new ConsoleDiagnostics(),
    verbose,
    promptSeparator: config.promptSeparator,
    trimInput: config.trimInput,
  });

  if (result.status === 'failed') {
    console.error(`Error: ${result.error.message}`);
    return 1;
  }
  return 0;
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      console.error(`Error: ${errorMessage(e)}`);
      process.exitCode = 1;
    },
  );
}
