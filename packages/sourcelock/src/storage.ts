import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { IOError, ValidationError } from './errors.js';

const CONFIG_DIR_NAME = '.sourcelock';

export function getConfigDir(): string {
  const home = os.homedir();
  const configDir = path.join(home, CONFIG_DIR_NAME);

  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { mode: 0o700, recursive: true });
  }

  return configDir;
}

/**
 * Read a JSON file from the config directory. Returns null when absent;
 * callers validate the shape.
 *
 * @throws ValidationError if the file is not valid JSON
 */
export function readJsonFile(filename: string): unknown {
  const filePath = path.join(getConfigDir(), filename);

  if (!fs.existsSync(filePath)) {
    return null;
  }

  const content = readTextFile(filePath);
  try {
    return JSON.parse(content);
  } catch (cause) {
    throw new ValidationError(`${filePath} is not valid JSON`, cause);
  }
}

/**
 * Create a directory (and parents) if missing. Idempotent.
 */
export function ensureDir(dir: string): void {
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (cause) {
    throw new IOError(`Cannot create directory ${dir}`, cause);
  }
}

export function readFileBytes(filePath: string): Buffer {
  try {
    return fs.readFileSync(filePath);
  } catch (cause) {
    throw new IOError(`Cannot read ${filePath}`, cause);
  }
}

export function readTextFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (cause) {
    throw new IOError(`Cannot read ${filePath}`, cause);
  }
}

/**
 * Write a file in one step: content goes to a sibling temp file which is then
 * renamed over the target, so a crash never leaves a half-written output.
 */
export function writeFileAtomic(
  filePath: string,
  content: string | Uint8Array,
  mode = 0o644,
): void {
  ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.${crypto.randomBytes(6).toString('hex')}.tmp`;

  try {
    fs.writeFileSync(tmpPath, content, { mode });
    fs.renameSync(tmpPath, filePath);
  } catch (cause) {
    fs.rmSync(tmpPath, { force: true });
    throw new IOError(`Cannot write ${filePath}`, cause);
  }
}

/**
 * Local-time stamp used in generated file names, e.g. `20260314_091502`.
 */
export function fileTimestamp(date: Date = new Date()): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
