#!/usr/bin/env node

/**
 * Main CLI entry point for turnstack
 *
 * Usage:
 *   turnstack [subcommand] [options]
 *
 * Subcommands:
 *   chat     - Talk to a YAML-declared dialog set in the console
 *   validate - Check a dialogs file without running it
 *   help     - Show help
 *   version  - Show version
 */

import * as fs from 'fs';
import * as path from 'path';

import { main as chatMain } from './cli/chat';
import { main as validateMain } from './cli/validate';
import { readEngineEnvironment } from './env-file';
import { isLogLevel, log, setDefaultLogLevel } from './log';

function printHelp(): void {
  console.log(`
turnstack - turn-based dialog engine

Usage:
  turnstack <subcommand> [options]

Subcommands:
  chat <dialogs.yaml> [options]   Hold a console conversation with a dialog set
  validate <dialogs.yaml>         Check a dialogs file and exit
  help                            Show this help message
  version                         Show version information

Examples:
  turnstack chat examples/greeting.yaml
  turnstack chat examples/greeting.yaml --memory -p "hi" "Carlos"
  turnstack validate examples/greeting.yaml

For detailed help on a specific subcommand:
  turnstack <subcommand> --help
`);
}

/** Nearest package.json above this file; works from sources and from dist/. */
export function readPackageVersion(startDir: string = __dirname): string {
  let dir = startDir;
  for (;;) {
    const candidate = path.join(dir, 'package.json');
    if (fs.existsSync(candidate)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
        return typeof parsed.version === 'string' ? parsed.version : 'unknown';
      }
      return 'unknown';
    }
    const parent = path.dirname(dir);
    if (parent === dir) return 'unknown';
    dir = parent;
  }
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const subcommand = args[0];
  const subcommandArgs = args.slice(1);

  if (subcommand === undefined || subcommand === '-h' || subcommand === '--help' || subcommand === 'help') {
    printHelp();
    return;
  }

  if (subcommand === '-v' || subcommand === '--version' || subcommand === 'version') {
    console.log(`turnstack v${readPackageVersion()}`);
    return;
  }

  // `.env` then `.env.local`; variables already in the environment win.
  const environment = readEngineEnvironment(process.cwd());
  for (const issue of environment.issues) {
    log.warn(`Ignoring ${issue.file}:${issue.line}: ${issue.message}`);
  }
  const level = environment.env.TURNSTACK_LOG_LEVEL?.toLowerCase();
  if (level !== undefined && isLogLevel(level)) setDefaultLogLevel(level);

  switch (subcommand) {
    case 'chat':
      await chatMain(subcommandArgs, environment.env);
      break;
    case 'validate':
      await validateMain(subcommandArgs);
      break;
    default:
      console.error(`Error: Unknown subcommand '${subcommand}'`);
      console.error(`Run 'turnstack help' for usage information.`);
      process.exitCode = 1;
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error('Unhandled error:', err);
    process.exit(1);
  });
}
