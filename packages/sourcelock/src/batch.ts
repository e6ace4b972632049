import * as path from 'node:path';
import { Decryptor, ENCRYPTED_SUFFIX } from './decryptor.js';
import type { DecryptFileResult } from './decryptor.js';
import { Encryptor, assertChunkSize } from './encryptor.js';
import type { EncryptFileResult } from './encryptor.js';
import { decodeKeyPackage, generateKeyPackage, loadKeyPackage, wipeKey } from './key-manager.js';
import type { DecodedKeyPackage } from './key-manager.js';
import { log } from './logger.js';
import type { ObfuscateOptions } from './obfuscator.js';
import { ensureDir, fileTimestamp } from './storage.js';

// -- Types ---

export interface EncryptBatchOptions extends ObfuscateOptions {
  readonly outputDir: string;
  /** Derive the master key from a password instead of generating a random one. */
  readonly password?: string;
  /** Reuse an existing key package instead of creating one. */
  readonly keyFile?: string;
  /** Decoded contents of `keyFile`, when the caller has already loaded it. */
  readonly keys?: DecodedKeyPackage;
  readonly chunkSize?: number;
  /** Keep aliases consistent across the files of the batch. */
  readonly shareAliases?: boolean;
  readonly signal?: AbortSignal;
  readonly onFileComplete?: (result: EncryptFileResult, index: number, total: number) => void;
}

export interface DecryptBatchOptions {
  readonly keyFile: string;
  /** Decoded contents of `keyFile`, when the caller has already loaded it. */
  readonly keys?: DecodedKeyPackage;
  readonly outputDir: string;
  readonly signal?: AbortSignal;
  readonly onFileComplete?: (result: DecryptFileResult, index: number, total: number) => void;
}

export interface BatchSummary<R> {
  readonly results: readonly R[];
  /** True when the signal fired before every file was processed. */
  readonly cancelled: boolean;
  readonly successCount: number;
  readonly total: number;
}

export interface EncryptBatchSummary extends BatchSummary<EncryptFileResult> {
  /** Key package used for the batch, needed to decrypt its outputs. */
  readonly keyFile: string;
}

export type DecryptBatchSummary = BatchSummary<DecryptFileResult>;

// -- Output naming ---

/**
 * `src/app.php` → `<outputDir>/app.encrypted.php`; other names get the suffix appended.
 */
export function encryptedOutputPath(inputPath: string, outputDir: string): string {
  const base = path.basename(inputPath);
  const name = base.endsWith('.php') ? `${base.slice(0, -'.php'.length)}${ENCRYPTED_SUFFIX}` : `${base}${ENCRYPTED_SUFFIX}`;
  return path.join(outputDir, name);
}

/**
 * `app.encrypted.php` → `<outputDir>/app.decrypted_<stamp>.php`.
 */
export function decryptedOutputPath(inputPath: string, outputDir: string, stamp: string): string {
  const base = path.basename(inputPath);
  const name = base.endsWith(ENCRYPTED_SUFFIX)
    ? `${base.slice(0, -ENCRYPTED_SUFFIX.length)}.decrypted_${stamp}.php`
    : `${base}.decrypted_${stamp}.php`;
  return path.join(outputDir, name);
}

// -- Public API ---

/**
 * Encrypt files one after another under a single key package.
 *
 * The key package is created (or loaded) before any file is touched, so a bad
 * key file aborts the batch up front. Per-file failures are collected and the
 * batch goes on. The signal is checked between files.
 *
 * @throws ValidationError if the chunk size or a supplied key package is invalid
 * @throws IOError if the output directory or key package cannot be written
 */
export async function encryptBatch(
  files: readonly string[],
  options: EncryptBatchOptions,
): Promise<EncryptBatchSummary> {
  if (options.chunkSize !== undefined) {
    assertChunkSize(options.chunkSize);
  }
  ensureDir(options.outputDir);

  let keyFile: string;
  let masterKey: Buffer;
  let salt: Buffer;
  if (options.keyFile !== undefined) {
    ({ masterKey, salt } = options.keys ?? decodeKeyPackage(loadKeyPackage(options.keyFile)));
    keyFile = options.keyFile;
  } else {
    const generated = await generateKeyPackage(options.outputDir, { password: options.password });
    ({ masterKey, salt } = generated);
    keyFile = generated.path;
    log(`Key package saved to ${keyFile}`);
  }

  const encryptor = new Encryptor(masterKey, salt, { shareMapping: options.shareAliases });
  const results: EncryptFileResult[] = [];

  try {
    for (const [index, inputPath] of files.entries()) {
      if (options.signal?.aborted) {
        log(`Cancelled after ${index} of ${files.length} file(s)`);
        break;
      }

      const result = await encryptor.encryptFile(inputPath, encryptedOutputPath(inputPath, options.outputDir), {
        renameVars: options.renameVars,
        renameFunctions: options.renameFunctions,
        renameClasses: options.renameClasses,
        chunkSize: options.chunkSize,
      });
      results.push(result);

      if (result.success) {
        log(`encrypted ${inputPath} (${result.chunksCount} chunks)`);
      } else {
        log(`failed ${inputPath}: ${result.error}`);
      }
      options.onFileComplete?.(result, index, files.length);
    }
  } finally {
    wipeKey(masterKey);
  }

  return summarize(results, files.length, { keyFile });
}

/**
 * Decrypt artifacts one after another with the key package from `keyFile`,
 * read once unless `keys` already holds it.
 * Files that are not artifacts are reported as failures without decrypting.
 *
 * @throws IOError if the key package cannot be read
 * @throws ValidationError if the key package is malformed; nothing is decrypted
 */
export async function decryptBatch(
  files: readonly string[],
  options: DecryptBatchOptions,
): Promise<DecryptBatchSummary> {
  const { masterKey } = options.keys ?? decodeKeyPackage(loadKeyPackage(options.keyFile));
  ensureDir(options.outputDir);

  const decryptor = new Decryptor(masterKey);
  const stamp = fileTimestamp();
  const results: DecryptFileResult[] = [];

  try {
    for (const [index, inputPath] of files.entries()) {
      if (options.signal?.aborted) {
        log(`Cancelled after ${index} of ${files.length} file(s)`);
        break;
      }

      let result: DecryptFileResult;
      if (!decryptor.validateFile(inputPath)) {
        result = {
          success: false,
          inputPath,
          error: `${inputPath} is not a sourcelock artifact`,
          code: 'format_error',
        };
      } else {
        result = await decryptor.decryptFile(inputPath, decryptedOutputPath(inputPath, options.outputDir, stamp));
      }
      results.push(result);

      if (result.success) {
        log(`decrypted ${inputPath} (${result.chunksCount} chunks)`);
      } else {
        log(`failed ${inputPath}: ${result.error}`);
      }
      options.onFileComplete?.(result, index, files.length);
    }
  } finally {
    wipeKey(masterKey);
  }

  return summarize(results, files.length, {});
}

// -- Internal Helpers ---

function summarize<R extends { readonly success: boolean }, E extends object>(
  results: R[],
  total: number,
  extra: E,
): BatchSummary<R> & E {
  return {
    ...extra,
    results,
    cancelled: results.length < total,
    successCount: results.filter((r) => r.success).length,
    total,
  };
}
