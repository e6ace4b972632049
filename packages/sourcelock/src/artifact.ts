import { z } from 'zod';
import type { SealedChunk } from './cipher-engine.js';
import { FormatError } from './errors.js';

// -- Types ---

/**
 * One encrypted chunk as stored in an artifact. Binary fields are base64.
 * `iv` is a per-artifact legacy value kept for format compatibility; the
 * chunk's own `nonce` is what decryption uses.
 */
export interface ArtifactChunk {
  readonly iv: string;
  readonly nonce: string;
  readonly data: string;
  readonly tag: string;
  readonly index: number;
}

/**
 * The serialized output of encrypting one file.
 */
export interface Artifact {
  readonly fileKey: string;
  readonly salt: string;
  readonly integrityHash: string;
  readonly chunks: readonly ArtifactChunk[];
}

export type ArtifactField = 'fileKey' | 'salt' | 'integrityHash' | 'chunks';

// -- Constants ---

export const ARTIFACT_MARKER = 'class PHPDecryptor';
export const ARTIFACT_FIELDS: readonly ArtifactField[] = ['fileKey', 'salt', 'integrityHash', 'chunks'];

const FIELD_ASSIGNMENT = /private\s+\$(fileKey|salt|integrityHash|chunks)\s*=\s*'([^']*)'\s*;/g;
const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

const base64String = z.string().regex(BASE64, 'must be base64');

const chunkSchema = z.object({
  iv: base64String,
  nonce: base64String.min(1, 'must not be empty'),
  data: base64String,
  tag: base64String.min(1, 'must not be empty'),
  index: z.number().int().nonnegative(),
});

const chunkListSchema = z.array(chunkSchema);

// -- Serialization ---

/**
 * Render an artifact as a PHP stub. Only the four field assignments and the
 * class marker carry meaning; readers locate them by pattern.
 */
export function serializeArtifact(artifact: Artifact): string {
  const chunks = Buffer.from(
    JSON.stringify(
      artifact.chunks.map((c) => ({ iv: c.iv, nonce: c.nonce, data: c.data, tag: c.tag, index: c.index })),
    ),
    'utf-8',
  ).toString('base64');

  return [
    '<?php',
    `${ARTIFACT_MARKER} {`,
    `    private $fileKey = '${artifact.fileKey}';`,
    `    private $salt = '${artifact.salt}';`,
    `    private $integrityHash = '${artifact.integrityHash}';`,
    `    private $chunks = '${chunks}';`,
    '}',
    '',
  ].join('\n');
}

/**
 * Extract and decode the four artifact fields.
 *
 * @throws FormatError if a field is missing, empty, not base64, or the chunk
 *   list is not a JSON array of chunk records
 */
export function parseArtifact(text: string): Artifact {
  const fields = new Map<ArtifactField, string>();
  FIELD_ASSIGNMENT.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = FIELD_ASSIGNMENT.exec(text)) !== null) {
    const name = match[1];
    const value = match[2];
    if (isArtifactField(name) && value !== undefined && !fields.has(name)) {
      fields.set(name, value);
    }
  }

  const missing = ARTIFACT_FIELDS.filter((field) => !fields.get(field));
  if (missing.length > 0) {
    throw new FormatError(`Artifact is missing field(s): ${missing.join(', ')}`);
  }

  const fileKey = requireBase64(fields, 'fileKey');
  const salt = requireBase64(fields, 'salt');
  const integrityHash = requireBase64(fields, 'integrityHash');
  const chunks = decodeChunkList(requireBase64(fields, 'chunks'));

  return { fileKey, salt, integrityHash, chunks };
}

/**
 * Binary view of a stored chunk, for the cipher engine.
 */
export function decodeChunk(chunk: ArtifactChunk): SealedChunk {
  return {
    nonce: Buffer.from(chunk.nonce, 'base64'),
    ciphertext: Buffer.from(chunk.data, 'base64'),
    tag: Buffer.from(chunk.tag, 'base64'),
  };
}

// -- Internal Helpers ---

function isArtifactField(name: string | undefined): name is ArtifactField {
  return ARTIFACT_FIELDS.some((field) => field === name);
}

function requireBase64(fields: ReadonlyMap<ArtifactField, string>, field: ArtifactField): string {
  const value = fields.get(field) ?? '';
  if (!BASE64.test(value)) {
    throw new FormatError(`Artifact field ${field} is not valid base64`);
  }
  return value;
}

function decodeChunkList(encoded: string): ArtifactChunk[] {
  let raw: unknown;
  try {
    raw = JSON.parse(Buffer.from(encoded, 'base64').toString('utf-8'));
  } catch (cause) {
    throw new FormatError('Artifact chunk list is not valid JSON', cause);
  }

  const parsed = chunkListSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join('.')}: ${first.message}` : 'invalid';
    throw new FormatError(`Artifact chunk list is malformed (${where})`, parsed.error);
  }
  return parsed.data;
}
