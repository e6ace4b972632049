import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Artifact } from './artifact.js';
import { ARTIFACT_FIELDS, ARTIFACT_MARKER, decodeChunk, parseArtifact } from './artifact.js';
import { CipherEngine } from './cipher-engine.js';
import { describeError, IntegrityError } from './errors.js';
import type { ErrorCode } from './errors.js';
import { generateFileKey } from './key-manager.js';
import { readTextFile, writeFileAtomic } from './storage.js';

// -- Types ---

export interface DecryptFileOptions {
  /**
   * Path (or base name) of the file as it was encrypted. Defaults to the input
   * path with `.encrypted.php` replaced by `.php`.
   */
  readonly originalIdentifier?: string;
}

export type DecryptFileResult =
  | {
      readonly success: true;
      readonly inputPath: string;
      readonly outputPath: string;
      readonly originalIdentifier: string;
      readonly decryptedSize: number;
      readonly chunksCount: number;
    }
  | {
      readonly success: false;
      readonly inputPath: string;
      readonly error: string;
      readonly code: ErrorCode | 'unknown_error';
    };

// -- Constants ---

export const ENCRYPTED_SUFFIX = '.encrypted.php';

const engine = new CipherEngine();

// -- Public API ---

/**
 * Quick structural check: the stub marker and all four field assignments are present.
 */
export function validateArtifact(text: string): boolean {
  if (!text.includes(ARTIFACT_MARKER)) {
    return false;
  }
  return ARTIFACT_FIELDS.every((field) => text.includes(`private $${field}`));
}

/**
 * {@link validateArtifact} for a file on disk. Unreadable files are reported invalid.
 */
export function validateArtifactFile(filePath: string): boolean {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch {
    return false;
  }
  return validateArtifact(text);
}

/**
 * Identifier an encrypted file was most likely produced from:
 * `out/app.encrypted.php` → `out/app.php`.
 */
export function inferOriginalIdentifier(encryptedPath: string): string {
  return encryptedPath.endsWith(ENCRYPTED_SUFFIX)
    ? `${encryptedPath.slice(0, -ENCRYPTED_SUFFIX.length)}.php`
    : encryptedPath;
}

/**
 * Restore the plaintext of an artifact.
 *
 * All chunks are opened before the integrity tag is checked; on any failure
 * the partial plaintext is zeroed and nothing is returned.
 *
 * @param fileIdentifier - Must have the same base name as at encryption time
 * @throws FormatError if the artifact fields are missing or malformed
 * @throws CryptoError if a chunk fails authentication (tampering or wrong key)
 * @throws IntegrityError if the chunk list was reordered, truncated or substituted
 */
export async function decrypt(
  artifactText: string,
  fileIdentifier: string,
  masterKey: Uint8Array,
): Promise<Buffer> {
  return decryptArtifact(parseArtifact(artifactText), fileIdentifier, masterKey);
}

/**
 * Same as {@link decrypt}, for an artifact that is already parsed.
 */
export async function decryptArtifact(
  artifact: Artifact,
  fileIdentifier: string,
  masterKey: Uint8Array,
): Promise<Buffer> {
  const fileKey = await generateFileKey(masterKey, fileIdentifier);

  const parts: Buffer[] = [];
  try {
    for (const chunk of artifact.chunks) {
      parts.push(engine.open(decodeChunk(chunk), fileKey));
    }
    if (!engine.verifyIntegrity(artifact.chunks, fileKey, artifact.integrityHash)) {
      throw new IntegrityError('Integrity verification failed: chunk list does not match its HMAC');
    }
    return Buffer.concat(parts);
  } finally {
    for (const part of parts) {
      part.fill(0);
    }
    fileKey.fill(0);
  }
}

// -- Decryptor ---

/**
 * Decrypts stubs with one batch master key.
 */
export class Decryptor {
  constructor(private readonly masterKey: Uint8Array) {}

  validateFile(filePath: string): boolean {
    return validateArtifactFile(filePath);
  }

  /**
   * Decrypt `inputPath` and write the restored source to `outputPath` in one
   * atomic step. Failures come back as a result, not an exception.
   */
  async decryptFile(
    inputPath: string,
    outputPath: string,
    options: DecryptFileOptions = {},
  ): Promise<DecryptFileResult> {
    const originalIdentifier = options.originalIdentifier ?? inferOriginalIdentifier(inputPath);

    try {
      const artifact = parseArtifact(readTextFile(inputPath));
      const plaintext = await decryptArtifact(artifact, originalIdentifier, this.masterKey);
      writeFileAtomic(outputPath, plaintext);

      return {
        success: true,
        inputPath,
        outputPath,
        originalIdentifier: path.basename(originalIdentifier),
        decryptedSize: plaintext.length,
        chunksCount: artifact.chunks.length,
      };
    } catch (error: unknown) {
      return { success: false, inputPath, ...describeError(error) };
    }
  }
}
