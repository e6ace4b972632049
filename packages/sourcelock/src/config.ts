import { z } from 'zod';
import { ValidationError } from './errors.js';
import { DEFAULT_CHUNK_SIZE, assertChunkSize } from './encryptor.js';
import { DEFAULT_OBFUSCATE_OPTIONS } from './obfuscator.js';
import { readJsonFile } from './storage.js';

// -- Types ---

export interface CliOptions {
  readonly outputDir?: string;
  /** Raw flag value; parsed like the env var. */
  readonly chunkSize?: string;
  readonly renameVars?: boolean;
  readonly renameFunctions?: boolean;
  readonly renameClasses?: boolean;
}

export interface SourcelockConfig {
  readonly outputDir: string;
  readonly chunkSize: number;
  readonly renameVars: boolean;
  readonly renameFunctions: boolean;
  readonly renameClasses: boolean;
}

// -- Constants ---

const CONFIG_FILENAME = 'config.json';
export const DEFAULT_OUTPUT_DIR = './encrypted';

const configFileSchema = z
  .object({
    outputDir: z.string().min(1),
    chunkSize: z.number(),
    renameVars: z.boolean(),
    renameFunctions: z.boolean(),
    renameClasses: z.boolean(),
  })
  .partial();

type ConfigFile = z.infer<typeof configFileSchema>;

// -- Public API ---

/**
 * Resolve options with precedence CLI flag > `SOURCELOCK_*` env > config file
 * (`~/.sourcelock/config.json`) > defaults.
 *
 * @throws ValidationError if the config file is malformed or the chunk size
 *   is not a positive integer
 */
export function resolveConfig(cli: CliOptions = {}): SourcelockConfig {
  const file = loadConfigFile();

  const outputDir =
    cli.outputDir ??
    process.env['SOURCELOCK_OUTPUT_DIR'] ??
    file.outputDir ??
    DEFAULT_OUTPUT_DIR;

  const rawChunkSize =
    cli.chunkSize ??
    process.env['SOURCELOCK_CHUNK_SIZE'] ??
    String(file.chunkSize ?? DEFAULT_CHUNK_SIZE);
  const chunkSize = parseChunkSize(rawChunkSize);

  return {
    outputDir,
    chunkSize,
    renameVars: cli.renameVars ?? file.renameVars ?? DEFAULT_OBFUSCATE_OPTIONS.renameVars,
    renameFunctions: cli.renameFunctions ?? file.renameFunctions ?? DEFAULT_OBFUSCATE_OPTIONS.renameFunctions,
    renameClasses: cli.renameClasses ?? file.renameClasses ?? DEFAULT_OBFUSCATE_OPTIONS.renameClasses,
  };
}

// -- Internal Helpers ---

function loadConfigFile(): ConfigFile {
  const raw = readJsonFile(CONFIG_FILENAME);
  if (raw === null) {
    return {};
  }
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
      .join('; ');
    throw new ValidationError(`Invalid ${CONFIG_FILENAME}: ${fields}`, parsed.error);
  }
  return parsed.data;
}

function parseChunkSize(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ValidationError(`chunk size must be a positive integer, got ${value}`);
  }
  const chunkSize = Number(trimmed);
  assertChunkSize(chunkSize);
  return chunkSize;
}
