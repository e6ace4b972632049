import * as crypto from 'node:crypto';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { IOError, ValidationError } from './errors.js';
import { ensureDir, fileTimestamp, writeFileAtomic } from './storage.js';

// -- Constants ---

export const KEY_LENGTH = 32; // bytes
export const SALT_LENGTH = 16; // bytes
export const MASTER_KEY_ITERATIONS = 100_000;
// Low on purpose: must match artifacts written by earlier releases.
export const FILE_KEY_ITERATIONS = 1_000;
const PBKDF2_DIGEST = 'sha256';

export const KEY_PACKAGE_ALGORITHM = 'AES-256-GCM';
export const KEY_PACKAGE_DERIVATION = 'PBKDF2-SHA256';
const KEY_PACKAGE_PREFIX = 'sourcelock_keys_';

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

// -- Types ---

const base64Field = z
  .string({ required_error: 'is required' })
  .min(1, 'must not be empty')
  .regex(BASE64_PATTERN, 'must be base64');

export const keyPackageSchema = z.object({
  master_key: base64Field,
  salt: base64Field,
  created_at: z.string({ required_error: 'is required' }),
  algorithm: z.literal(KEY_PACKAGE_ALGORITHM),
  key_derivation: z.literal(KEY_PACKAGE_DERIVATION),
  iterations: z.number().int().positive(),
});

/**
 * Persisted record of one encryption batch's key material.
 */
export type KeyPackage = z.infer<typeof keyPackageSchema>;

export interface MasterKeyResult {
  readonly key: Buffer;
  /** Present only for password-derived keys. */
  readonly salt?: Buffer;
}

export interface GeneratedKeyPackage {
  readonly masterKey: Buffer;
  readonly salt: Buffer;
  readonly path: string;
  readonly record: KeyPackage;
}

export interface DecodedKeyPackage {
  readonly masterKey: Buffer;
  readonly salt: Buffer;
}

// -- Internal ---

function pbkdf2(
  secret: string | Uint8Array,
  salt: string | Uint8Array,
  iterations: number,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    crypto.pbkdf2(secret, salt, iterations, KEY_LENGTH, PBKDF2_DIGEST, (error, key) => {
      if (error) {
        reject(error);
      } else {
        resolve(key);
      }
    });
  });
}

// -- Public API ---

/**
 * Create a batch master key.
 *
 * With a password the key is PBKDF2-SHA256 (100k iterations) over a fresh
 * 16-byte salt, which is returned alongside. Without one it is 32 random bytes.
 */
export async function generateMasterKey(password?: string): Promise<MasterKeyResult> {
  if (password === undefined) {
    return { key: crypto.randomBytes(KEY_LENGTH) };
  }
  if (password.length === 0) {
    throw new ValidationError('password must not be empty');
  }

  const salt = crypto.randomBytes(SALT_LENGTH);
  const key = await pbkdf2(password, salt, MASTER_KEY_ITERATIONS);
  return { key, salt };
}

/**
 * Derive the per-file key: PBKDF2-SHA256(masterKey, basename(fileIdentifier), 1000).
 *
 * Only the base name salts the derivation, so `a/x.php` and `b/x.php` share a key.
 */
export async function generateFileKey(
  masterKey: Uint8Array,
  fileIdentifier: string,
): Promise<Buffer> {
  if (masterKey.length === 0) {
    throw new ValidationError('master key must not be empty');
  }
  const salt = Buffer.from(path.basename(fileIdentifier), 'utf-8');
  return pbkdf2(masterKey, salt, FILE_KEY_ITERATIONS);
}

export function buildKeyPackage(
  masterKey: Uint8Array,
  salt: Uint8Array,
  createdAt: Date = new Date(),
): KeyPackage {
  return {
    master_key: Buffer.from(masterKey).toString('base64'),
    salt: Buffer.from(salt).toString('base64'),
    created_at: createdAt.toISOString(),
    algorithm: KEY_PACKAGE_ALGORITHM,
    key_derivation: KEY_PACKAGE_DERIVATION,
    iterations: MASTER_KEY_ITERATIONS,
  };
}

/**
 * Write a key package as `sourcelock_keys_<stamp>.json` under `dir`.
 *
 * @returns Path of the written file
 * @throws IOError if the directory or file cannot be written
 */
export function saveKeyPackage(record: KeyPackage, dir: string): string {
  ensureDir(dir);
  const keyFile = path.join(dir, `${KEY_PACKAGE_PREFIX}${fileTimestamp()}.json`);
  writeFileAtomic(keyFile, JSON.stringify(record, null, 2), 0o600);
  return keyFile;
}

/**
 * Read and validate a key package.
 *
 * @throws IOError if the file cannot be read
 * @throws ValidationError if it is not JSON or a field is missing or malformed
 */
export function loadKeyPackage(keyFile: string): KeyPackage {
  let content: string;
  try {
    content = fs.readFileSync(keyFile, 'utf-8');
  } catch (cause) {
    throw new IOError(`Cannot read key package ${keyFile}`, cause);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (cause) {
    throw new ValidationError(`Key package ${keyFile} is not valid JSON`, cause);
  }

  const parsed = keyPackageSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid key package: ${fields}`, parsed.error);
  }
  return parsed.data;
}

/**
 * Decode the secrets of a loaded key package.
 *
 * @throws ValidationError if the master key is not 32 bytes
 */
export function decodeKeyPackage(record: KeyPackage): DecodedKeyPackage {
  const masterKey = Buffer.from(record.master_key, 'base64');
  if (masterKey.length !== KEY_LENGTH) {
    throw new ValidationError(
      `Invalid key package: master_key must decode to ${KEY_LENGTH} bytes, got ${masterKey.length}`,
    );
  }
  return { masterKey, salt: Buffer.from(record.salt, 'base64') };
}

/**
 * Fresh key material for one encryption batch, persisted under `dir`.
 * A password-derived master key keeps its PBKDF2 salt; a random one gets a random salt.
 */
export async function generateKeyPackage(
  dir: string,
  options: { password?: string } = {},
): Promise<GeneratedKeyPackage> {
  const master = await generateMasterKey(options.password);
  const salt = master.salt ?? crypto.randomBytes(SALT_LENGTH);
  const record = buildKeyPackage(master.key, salt);
  const keyFile = saveKeyPackage(record, dir);

  return { masterKey: master.key, salt, path: keyFile, record };
}

/**
 * Best-effort zeroing of key material. The GC may still hold copies.
 */
export function wipeKey(buffer: Uint8Array): void {
  buffer.fill(0);
}
