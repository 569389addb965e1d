#!/usr/bin/env tsx

import { spawn } from 'node:child_process';
import * as fs from 'node:fs';
import * as path from 'node:path';

function printHelp(): void {
  console.log(`
turnstack tests CLI

Usage:
  npm test                       # run every test script
  npm test -- <script.ts>...     # run selected scripts (paths relative to tests/)

Notes:
  - Each script runs in its own node process with the tsx loader.
  - A script fails by exiting non-zero (an uncaught error or process.exitCode = 1).
  - Files under tests/helpers/ are shared code, not scripts.
`);
}

const SKIP_DIRS = new Set(['helpers', 'fixtures']);

function discoverScripts(dir: string): string[] {
  const found: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const abs = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (!SKIP_DIRS.has(entry.name)) found.push(...discoverScripts(abs));
      continue;
    }
    if (entry.isFile() && entry.name.endsWith('.ts') && !entry.name.endsWith('.d.ts')) {
      found.push(abs);
    }
  }
  return found.sort((a, b) => a.localeCompare(b));
}

function runScript(scriptAbs: string, repoRoot: string): Promise<number> {
  return new Promise((resolve) => {
    const child = spawn(process.execPath, ['--import', 'tsx', scriptAbs], {
      cwd: repoRoot,
      stdio: 'inherit',
      env: {
        ...process.env,
        TURNSTACK_LOG_LEVEL: process.env.TURNSTACK_LOG_LEVEL ?? 'error',
      },
    });
    child.on('error', (err) => {
      console.error(`Failed to start ${scriptAbs}: ${err.message}`);
      resolve(1);
    });
    child.on('exit', (code, signal) => {
      if (signal) {
        console.error(`Test script terminated by signal: ${signal}`);
        resolve(1);
        return;
      }
      resolve(code ?? 1);
    });
  });
}

async function main(): Promise<void> {
  const testsRoot = path.resolve(__dirname);
  const repoRoot = path.resolve(testsRoot, '..');
  const selfAbs = path.resolve(__filename);

  const rawArgv = process.argv.slice(2);
  const args = rawArgv.length > 0 && rawArgv[0] === '--' ? rawArgv.slice(1) : rawArgv;
  if (args[0] === '-h' || args[0] === '--help' || args[0] === 'help') {
    printHelp();
    return;
  }

  const scripts =
    args.length > 0
      ? args.map((arg) => (path.isAbsolute(arg) ? arg : path.resolve(testsRoot, arg)))
      : discoverScripts(testsRoot).filter((script) => script !== selfAbs);

  const failed: string[] = [];
  for (const scriptAbs of scripts) {
    const rel = path.relative(testsRoot, scriptAbs);
    if (!fs.existsSync(scriptAbs)) {
      console.error(`Error: script not found: ${scriptAbs}`);
      failed.push(rel);
      continue;
    }
    console.log(`▶ ${rel}`);
    const code = await runScript(scriptAbs, repoRoot);
    if (code !== 0) failed.push(rel);
  }

  console.log('');
  console.log(`${scripts.length - failed.length}/${scripts.length} test scripts passed`);
  if (failed.length > 0) {
    for (const rel of failed) console.error(`  failed: ${rel}`);
    process.exitCode = 1;
  }
}

void main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`tests cli failed: ${message}`);
  process.exit(1);
});
