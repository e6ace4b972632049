#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { Command } from 'commander';
import { decryptBatch, encryptBatch } from './batch.js';
import { resolveConfig } from './config.js';
import type { CliOptions } from './config.js';
import { validateArtifactFile } from './decryptor.js';
import { describeError } from './errors.js';
import { decodeKeyPackage, generateKeyPackage, loadKeyPackage, wipeKey } from './key-manager.js';
import type { DecodedKeyPackage } from './key-manager.js';
import { log } from './logger.js';
import { outputError, outputJson } from './output.js';
import { promptNewPassword } from './password-prompt.js';
import { readTextFile } from './storage.js';
import { getCodeStatistics } from './tokenizer.js';

// -- Exit codes ---

const EXIT_FAILURE = 1;
const EXIT_PARTIAL = 2;
const EXIT_INVALID_KEY_PACKAGE = 3;

// -- Internal Helpers ---

function handleError(error: unknown, defaultCode: string, exitCode: number): void {
  const { error: message, code } = describeError(error);
  outputError(code === 'unknown_error' ? defaultCode : code, message, exitCode);
}

/**
 * Load and decode the key package before any file is touched, so a bad key
 * file exits with its own code. The batch takes the decoded keys and wipes them.
 */
function loadKeys(keyFile: string): DecodedKeyPackage | undefined {
  try {
    return decodeKeyPackage(loadKeyPackage(keyFile));
  } catch (error: unknown) {
    outputError('invalid_key_package', describeError(error).error, EXIT_INVALID_KEY_PACKAGE);
    return undefined;
  }
}

/**
 * AbortSignal that fires on Ctrl+C. The in-flight file finishes; the rest are skipped.
 */
async function withInterrupt<T>(run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onSigint = (): void => {
    log('Interrupted, finishing current file');
    controller.abort();
  };
  process.once('SIGINT', onSigint);
  try {
    return await run(controller.signal);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

/**
 * Commander always fills a `--no-x` flag with its default; only an explicit
 * flag should override the config file.
 */
function explicitFlag(command: Command, key: string, value: boolean | undefined): boolean | undefined {
  return command.getOptionValueSource(key) === 'cli' ? value : undefined;
}

// -- Public API ---

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('sourcelock')
    .version('0.1.0')
    .description('Encrypt and obfuscate PHP source files into self-describing stubs');

  // ── Key commands ─────────────────────────────────────────────

  const keys = program
    .command('keys')
    .description('Key package management');

  keys
    .command('create')
    .description('Generate a master key and save it as a key package')
    .option('-o, --output <dir>', 'Directory for the key package')
    .option('--password', 'Derive the master key from a password')
    .action(async (options: { output?: string; password?: boolean }) => {
      try {
        const config = resolveConfig({ outputDir: options.output });
        const password = options.password ? await promptNewPassword() : undefined;
        const generated = await generateKeyPackage(config.outputDir, { password });
        wipeKey(generated.masterKey);

        outputJson({
          ok: true,
          keyFile: generated.path,
          createdAt: generated.record.created_at,
          passwordDerived: password !== undefined,
        });
      } catch (error: unknown) {
        handleError(error, 'keys_create_failed', EXIT_FAILURE);
      }
    });

  // ── Encrypt / decrypt ────────────────────────────────────────

  program
    .command('encrypt')
    .description('Obfuscate and encrypt PHP files')
    .argument('<files...>', 'PHP files to encrypt')
    .option('-o, --output <dir>', 'Output directory')
    .option('-k, --key <file>', 'Reuse an existing key package')
    .option('--no-rename-vars', 'Keep variable names')
    .option('--rename-functions', 'Rename user-defined functions')
    .option('--rename-classes', 'Rename user-defined classes')
    .option('--share-aliases', 'Use one alias map for all files (needed when files call each other)')
    .option('--chunk-size <bytes>', 'Plaintext bytes per encrypted chunk')
    .option('--password', 'Derive the master key from a password')
    .action(
      async (
        files: string[],
        options: {
          output?: string;
          key?: string;
          renameVars?: boolean;
          renameFunctions?: boolean;
          renameClasses?: boolean;
          shareAliases?: boolean;
          chunkSize?: string;
          password?: boolean;
        },
        command: Command,
      ) => {
        const cli: CliOptions = {
          outputDir: options.output,
          chunkSize: options.chunkSize,
          renameVars: explicitFlag(command, 'renameVars', options.renameVars),
          renameFunctions: options.renameFunctions,
          renameClasses: options.renameClasses,
        };

        try {
          const config = resolveConfig(cli);
          const decoded = options.key !== undefined ? loadKeys(options.key) : undefined;
          if (options.key !== undefined && decoded === undefined) {
            return;
          }
          const password =
            options.password && options.key === undefined ? await promptNewPassword() : undefined;

          const summary = await withInterrupt((signal) =>
            encryptBatch(files, {
              ...config,
              keyFile: options.key,
              keys: decoded,
              shareAliases: options.shareAliases,
              password,
              signal,
            }),
          );

          outputJson({
            ok: summary.successCount === summary.total,
            keyFile: summary.keyFile,
            outputDir: config.outputDir,
            successCount: summary.successCount,
            total: summary.total,
            cancelled: summary.cancelled,
            files: summary.results,
          });
          if (summary.successCount < summary.total) {
            process.exit(EXIT_PARTIAL);
          }
        } catch (error: unknown) {
          handleError(error, 'encrypt_failed', EXIT_FAILURE);
        }
      },
    );

  program
    .command('decrypt')
    .description('Decrypt artifacts produced by `sourcelock encrypt`')
    .argument('<files...>', 'Encrypted .php stubs')
    .requiredOption('-k, --key <file>', 'Key package of the batch that produced the files')
    .option('-o, --output <dir>', 'Output directory')
    .action(async (files: string[], options: { key: string; output?: string }) => {
      try {
        const config = resolveConfig({ outputDir: options.output });
        const decoded = loadKeys(options.key);
        if (decoded === undefined) {
          return;
        }

        const summary = await withInterrupt((signal) =>
          decryptBatch(files, { keyFile: options.key, keys: decoded, outputDir: config.outputDir, signal }),
        );

        outputJson({
          ok: summary.successCount === summary.total,
          outputDir: config.outputDir,
          successCount: summary.successCount,
          total: summary.total,
          cancelled: summary.cancelled,
          files: summary.results,
        });
        if (summary.successCount < summary.total) {
          process.exit(EXIT_PARTIAL);
        }
      } catch (error: unknown) {
        handleError(error, 'decrypt_failed', EXIT_FAILURE);
      }
    });

  // ── Inspection ───────────────────────────────────────────────

  program
    .command('validate')
    .description('Check that files look like sourcelock artifacts')
    .argument('<files...>', 'Files to check')
    .action((files: string[]) => {
      const results = files.map((file) => ({ path: file, valid: validateArtifactFile(file) }));
      const validCount = results.filter((r) => r.valid).length;

      outputJson({ ok: validCount === files.length, validCount, total: files.length, files: results });
      if (validCount < files.length) {
        process.exit(EXIT_PARTIAL);
      }
    });

  program
    .command('inspect')
    .description('Show identifier and size statistics for a PHP file')
    .argument('<file>', 'PHP source file')
    .action((file: string) => {
      try {
        const stats = getCodeStatistics(readTextFile(file));
        outputJson({ ok: true, path: file, ...stats });
      } catch (error: unknown) {
        handleError(error, 'inspect_failed', EXIT_FAILURE);
      }
    });

  return program;
}

// Only parse when run directly (not imported in tests).
// Resolve symlinks so `sourcelock` (a symlink to dist/cli.js) is detected.
const resolvedArgv = process.argv[1] ? realpathSync(process.argv[1]) : '';
const isDirectRun = resolvedArgv.endsWith('cli.ts') || resolvedArgv.endsWith('cli.js');

if (isDirectRun) {
  const program = buildProgram();
  program.parseAsync().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    outputError('unexpected_error', message, EXIT_FAILURE);
  });
}
