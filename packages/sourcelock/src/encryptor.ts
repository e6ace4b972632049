import * as crypto from 'node:crypto';
import type { Artifact, ArtifactChunk } from './artifact.js';
import { serializeArtifact } from './artifact.js';
import { CipherEngine, NONCE_LENGTH } from './cipher-engine.js';
import { describeError, ValidationError } from './errors.js';
import type { ErrorCode } from './errors.js';
import { generateFileKey, SALT_LENGTH } from './key-manager.js';
import { Obfuscator, resolveObfuscateOptions } from './obfuscator.js';
import type { MappingSnapshot, ObfuscateOptions } from './obfuscator.js';
import { readFileBytes, writeFileAtomic } from './storage.js';
import { PhpTokenizer } from './tokenizer.js';
import type { SourceScanner } from './tokenizer.js';

// -- Types ---

export interface EncryptOptions {
  /** Plaintext bytes per chunk. Defaults to 8192. */
  readonly chunkSize?: number;
  /** Salt recorded in the artifact. Random when omitted. */
  readonly salt?: Uint8Array;
}

export interface EncryptFileOptions extends ObfuscateOptions {
  readonly chunkSize?: number;
}

export type EncryptFileResult =
  | {
      readonly success: true;
      readonly inputPath: string;
      readonly outputPath: string;
      readonly originalSize: number;
      readonly encryptedSize: number;
      readonly chunksCount: number;
    }
  | {
      readonly success: false;
      readonly inputPath: string;
      readonly error: string;
      readonly code: ErrorCode | 'unknown_error';
    };

// -- Constants ---

export const DEFAULT_CHUNK_SIZE = 8192;

const engine = new CipherEngine();

// -- Public API ---

export function assertChunkSize(chunkSize: number): void {
  if (!Number.isSafeInteger(chunkSize) || chunkSize < 1) {
    throw new ValidationError(`chunk size must be a positive integer, got ${chunkSize}`);
  }
}

/**
 * Encrypt plaintext into an artifact.
 *
 * The file key is derived from the master key and the identifier's base name.
 * Plaintext is split into `chunkSize` segments in order, each sealed with
 * AES-256-GCM under its own random nonce, and the chunk list is bound by an
 * HMAC-SHA256 integrity tag.
 *
 * @throws CryptoError if a cipher operation fails
 * @throws ValidationError if the chunk size is not a positive integer
 */
export async function encrypt(
  plaintext: Uint8Array,
  fileIdentifier: string,
  masterKey: Uint8Array,
  options: EncryptOptions = {},
): Promise<Artifact> {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  assertChunkSize(chunkSize);

  const fileKey = await generateFileKey(masterKey, fileIdentifier);
  const salt = options.salt ?? crypto.randomBytes(SALT_LENGTH);
  const legacyIv = crypto.randomBytes(NONCE_LENGTH).toString('base64');

  const usedNonces = new Set<string>();
  const chunks: ArtifactChunk[] = [];

  for (let offset = 0, index = 0; offset < plaintext.length; offset += chunkSize, index++) {
    let nonce = crypto.randomBytes(NONCE_LENGTH);
    while (usedNonces.has(nonce.toString('hex'))) {
      nonce = crypto.randomBytes(NONCE_LENGTH);
    }
    usedNonces.add(nonce.toString('hex'));

    const sealed = engine.seal(plaintext.subarray(offset, offset + chunkSize), fileKey, nonce);
    chunks.push({
      iv: legacyIv,
      nonce: sealed.nonce.toString('base64'),
      data: sealed.ciphertext.toString('base64'),
      tag: sealed.tag.toString('base64'),
      index,
    });
  }

  return {
    fileKey: fileKey.toString('base64'),
    salt: Buffer.from(salt).toString('base64'),
    integrityHash: engine.integrityTag(chunks, fileKey),
    chunks,
  };
}

// -- Encryptor ---

export interface EncryptorDeps {
  /** Renamer to use; supplying one implies a shared mapping. */
  readonly obfuscator?: Obfuscator;
  readonly scanner?: SourceScanner;
  /**
   * Keep one identifier map across every file this instance encrypts, so a
   * function renamed in one file keeps its alias where another file calls it.
   * Off by default: each file gets a fresh map.
   */
  readonly shareMapping?: boolean;
}

/**
 * Encrypts PHP files for one batch under a single master key and salt.
 */
export class Encryptor {
  private obfuscator: Obfuscator;
  private readonly scanner: SourceScanner;
  private readonly shareMapping: boolean;

  constructor(
    private readonly masterKey: Uint8Array,
    private readonly salt: Uint8Array,
    deps: EncryptorDeps = {},
  ) {
    this.obfuscator = deps.obfuscator ?? new Obfuscator();
    this.scanner = deps.scanner ?? new PhpTokenizer();
    this.shareMapping = deps.shareMapping ?? deps.obfuscator !== undefined;
  }

  /**
   * Tokenize, optionally rename, then encrypt PHP source.
   */
  async encryptSource(
    source: string,
    fileIdentifier: string,
    options: EncryptFileOptions = {},
  ): Promise<Artifact> {
    const renames = resolveObfuscateOptions(options);
    const renaming = renames.renameVars || renames.renameFunctions || renames.renameClasses;
    if (!renaming) {
      return this.encryptBytes(Buffer.from(source, 'utf-8'), fileIdentifier, options);
    }

    if (!this.shareMapping) {
      this.obfuscator = new Obfuscator();
    }
    const text = this.obfuscator.obfuscate(this.scanner.scan(source), renames);
    return this.encryptBytes(Buffer.from(text, 'utf-8'), fileIdentifier, options);
  }

  /**
   * Encrypt `inputPath` into a stub at `outputPath`. The stub is written in one
   * atomic step. Failures come back as a result, not an exception.
   *
   * Without renaming the file's bytes are encrypted as read. Renaming needs the
   * text, so a file that is not valid UTF-8 fails with `validation_error`.
   */
  async encryptFile(
    inputPath: string,
    outputPath: string,
    options: EncryptFileOptions = {},
  ): Promise<EncryptFileResult> {
    try {
      const bytes = readFileBytes(inputPath);
      const renames = resolveObfuscateOptions(options);
      const renaming = renames.renameVars || renames.renameFunctions || renames.renameClasses;
      const artifact = renaming
        ? await this.encryptSource(decodeUtf8(bytes, inputPath), inputPath, options)
        : await this.encryptBytes(bytes, inputPath, options);
      const stub = serializeArtifact(artifact);
      writeFileAtomic(outputPath, stub);

      return {
        success: true,
        inputPath,
        outputPath,
        originalSize: bytes.length,
        encryptedSize: Buffer.byteLength(stub, 'utf-8'),
        chunksCount: artifact.chunks.length,
      };
    } catch (error: unknown) {
      return { success: false, inputPath, ...describeError(error) };
    }
  }

  /**
   * Aliases of the most recently renamed file, or of every file when the mapping is shared.
   */
  getMappingSnapshot(): MappingSnapshot {
    return this.obfuscator.getMappingSnapshot();
  }

  private encryptBytes(bytes: Uint8Array, fileIdentifier: string, options: EncryptFileOptions): Promise<Artifact> {
    return encrypt(bytes, fileIdentifier, this.masterKey, { chunkSize: options.chunkSize, salt: this.salt });
  }
}

// -- Internal Helpers ---

const UTF8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function decodeUtf8(bytes: Uint8Array, filePath: string): string {
  try {
    return UTF8.decode(bytes);
  } catch (cause) {
    throw new ValidationError(`${filePath} is not valid UTF-8; encrypt it without renaming`, cause);
  }
}
