/**
 * Module: env-file
 *
 * Engine settings kept in `.env` and `.env.local` beside the working
 * directory. Only `TURNSTACK_*` keys are taken; other keys belong to other
 * tools and are skipped. The process environment is never modified: the
 * merged view is handed to `loadEngineConfig`.
 */
import * as fs from 'fs';
import * as path from 'path';

import { ENGINE_ENV_KEYS } from './config';
import { isLogLevel } from './log';

export type EnvFileName = '.env' | '.env.local';

export type EnvFileIssue = Readonly<{
  file: EnvFileName;
  line: number;
  message: string;
}>;

export type EngineEnvironment = Readonly<{
  /** File settings with the process environment laid over them. */
  env: NodeJS.ProcessEnv;
  files: ReadonlyArray<EnvFileName>;
  issues: ReadonlyArray<EnvFileIssue>;
}>;

const ENV_FILES: ReadonlyArray<EnvFileName> = ['.env', '.env.local'];
const PREFIX = 'TURNSTACK_';
const ASSIGNMENT = /^(?:export\s+)?([^=]*?)\s*=\s*(.*)$/;
const KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

function settingValue(raw: string): string {
  const quote = raw[0];
  if (raw.length >= 2 && (quote === '"' || quote === "'") && raw.endsWith(quote)) {
    return raw.slice(1, -1);
  }
  if (raw.startsWith('#')) return '';
  const comment = raw.search(/\s#/);
  return comment < 0 ? raw : raw.slice(0, comment).trimEnd();
}

function checkSetting(key: string, value: string): string | undefined {
  if (!ENGINE_ENV_KEYS.has(key)) return `unknown setting '${key}'`;
  if (key === 'TURNSTACK_LOG_LEVEL' && !isLogLevel(value.toLowerCase())) {
    return `'${value}' is not a log level (debug, info, warn, error)`;
  }
  return undefined;
}

function readEnvFile(
  file: EnvFileName,
  content: string,
  into: Record<string, string>,
  issues: EnvFileIssue[],
): void {
  content.split(/\r?\n/).forEach((text, index) => {
    const trimmed = text.trim();
    if (!trimmed || trimmed.startsWith('#')) return;
    const line = index + 1;
    const match = ASSIGNMENT.exec(trimmed);
    if (!match) {
      issues.push({ file, line, message: 'expected KEY=value' });
      return;
    }
    const [, key, raw] = match;
    if (!KEY.test(key)) {
      issues.push({ file, line, message: `'${key}' is not a valid key` });
      return;
    }
    if (!key.startsWith(PREFIX)) return;
    const value = settingValue(raw);
    const problem = checkSetting(key, value);
    if (problem) {
      issues.push({ file, line, message: problem });
      return;
    }
    into[key] = value;
  });
}

/**
 * Read `.env` then `.env.local` from `cwd`. Later files win; variables in
 * `processEnv` win over both.
 */
export function readEngineEnvironment(
  cwd: string,
  processEnv: NodeJS.ProcessEnv = process.env,
): EngineEnvironment {
  const fromFiles: Record<string, string> = {};
  const files: EnvFileName[] = [];
  const issues: EnvFileIssue[] = [];
  for (const file of ENV_FILES) {
    const filePath = path.join(cwd, file);
    if (!fs.existsSync(filePath)) continue;
    files.push(file);
    readEnvFile(file, fs.readFileSync(filePath, 'utf8'), fromFiles, issues);
  }
  return { env: { ...fromFiles, ...processEnv }, files, issues };
}
