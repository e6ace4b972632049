import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { serializeArtifact } from './artifact.js';
import type { Artifact, ArtifactChunk } from './artifact.js';
import { Decryptor, decrypt, inferOriginalIdentifier, validateArtifact, validateArtifactFile } from './decryptor.js';
import { encrypt, Encryptor } from './encryptor.js';
import { CryptoError, FormatError, IntegrityError } from './errors.js';

const MASTER_KEY = Buffer.alloc(32, 7);
const OTHER_KEY = Buffer.alloc(32, 8);
const SALT = Buffer.alloc(16, 1);

function withChunks(artifact: Artifact, chunks: readonly ArtifactChunk[]): string {
  return serializeArtifact({ ...artifact, chunks });
}

function chunkAt(artifact: Artifact, index: number): ArtifactChunk {
  const chunk = artifact.chunks[index];
  if (chunk === undefined) throw new Error(`artifact has no chunk ${index}`);
  return chunk;
}

function flipFirstBit(base64: string): string {
  const bytes = Buffer.from(base64, 'base64');
  bytes[0] = (bytes[0] ?? 0) ^ 0x80;
  return bytes.toString('base64');
}

describe('decrypt', () => {
  const plaintext = Buffer.alloc(20_000);
  for (let i = 0; i < plaintext.length; i++) plaintext[i] = i % 251;
  let artifact: Artifact;

  beforeEach(async () => {
    artifact = await encrypt(plaintext, 'app.php', MASTER_KEY);
  });

  it('restores the plaintext', async () => {
    const restored = await decrypt(serializeArtifact(artifact), 'app.php', MASTER_KEY);

    expect(restored.equals(plaintext)).toBe(true);
  });

  it('accepts any path with the same base name', async () => {
    const restored = await decrypt(serializeArtifact(artifact), '/srv/out/app.php', MASTER_KEY);

    expect(restored.equals(plaintext)).toBe(true);
  });

  it('fails with CryptoError for the wrong identifier', async () => {
    await expect(decrypt(serializeArtifact(artifact), 'other.php', MASTER_KEY)).rejects.toThrow(CryptoError);
  });

  it('fails with CryptoError for the wrong master key', async () => {
    await expect(decrypt(serializeArtifact(artifact), 'app.php', OTHER_KEY)).rejects.toThrow(CryptoError);
  });

  it('fails with CryptoError when a ciphertext byte is flipped', async () => {
    const first = chunkAt(artifact, 0);
    const data = Buffer.from(first.data, 'base64');
    data[10] = (data[10] ?? 0) ^ 0x01;
    const tampered = withChunks(artifact, [{ ...first, data: data.toString('base64') }, ...artifact.chunks.slice(1)]);

    await expect(decrypt(tampered, 'app.php', MASTER_KEY)).rejects.toThrow(
      'Decryption failed: invalid authentication tag or wrong key',
    );
  });

  it.each(['nonce', 'data', 'tag'] as const)(
    'fails with CryptoError when one bit of the middle chunk %s is flipped',
    async (field) => {
      const middle = chunkAt(artifact, 1);
      const flipped: ArtifactChunk = {
        ...middle,
        nonce: field === 'nonce' ? flipFirstBit(middle.nonce) : middle.nonce,
        data: field === 'data' ? flipFirstBit(middle.data) : middle.data,
        tag: field === 'tag' ? flipFirstBit(middle.tag) : middle.tag,
      };
      const tampered = withChunks(artifact, [chunkAt(artifact, 0), flipped, chunkAt(artifact, 2)]);

      await expect(decrypt(tampered, 'app.php', MASTER_KEY)).rejects.toThrow(
        'Decryption failed: invalid authentication tag or wrong key',
      );
    },
  );

  it('fails with IntegrityError when chunks are reordered', async () => {
    const swapped = withChunks(artifact, [chunkAt(artifact, 1), chunkAt(artifact, 0), chunkAt(artifact, 2)]);

    await expect(decrypt(swapped, 'app.php', MASTER_KEY)).rejects.toThrow(IntegrityError);
  });

  it('fails with IntegrityError when a chunk is dropped', async () => {
    const truncated = withChunks(artifact, artifact.chunks.slice(0, 2));

    await expect(decrypt(truncated, 'app.php', MASTER_KEY)).rejects.toThrow(
      'Integrity verification failed: chunk list does not match its HMAC',
    );
  });

  it('fails with IntegrityError when the stored hash is replaced', async () => {
    const text = serializeArtifact({ ...artifact, integrityHash: Buffer.alloc(32).toString('base64') });

    await expect(decrypt(text, 'app.php', MASTER_KEY)).rejects.toThrow(IntegrityError);
  });

  it('round-trips empty input and rejects it under another key', async () => {
    const empty = serializeArtifact(await encrypt(Buffer.alloc(0), 'empty.php', MASTER_KEY));

    expect(await decrypt(empty, 'empty.php', MASTER_KEY)).toHaveLength(0);
    await expect(decrypt(empty, 'empty.php', OTHER_KEY)).rejects.toThrow(IntegrityError);
  });

  it('fails with FormatError for text that is not an artifact', async () => {
    await expect(decrypt('<?php echo 1;', 'app.php', MASTER_KEY)).rejects.toThrow(FormatError);
  });
});

describe('validateArtifact', () => {
  it('accepts a serialized artifact', async () => {
    const text = serializeArtifact(await encrypt(Buffer.from('x'), 'a.php', MASTER_KEY));

    expect(validateArtifact(text)).toBe(true);
  });

  it('rejects text without the class marker or a field', () => {
    expect(validateArtifact('<?php echo 1;')).toBe(false);
    expect(validateArtifact("class PHPDecryptor { private $fileKey = ''; private $salt = ''; }")).toBe(false);
  });
});

describe('inferOriginalIdentifier', () => {
  it('maps .encrypted.php back to .php', () => {
    expect(inferOriginalIdentifier('out/app.encrypted.php')).toBe('out/app.php');
  });

  it('leaves other names alone', () => {
    expect(inferOriginalIdentifier('out/app.php')).toBe('out/app.php');
  });
});

describe('Decryptor', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sourcelock-decryptor-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  async function encryptTo(name: string, source: string): Promise<string> {
    const inputPath = path.join(tmpDir, name);
    const outputPath = path.join(tmpDir, 'enc', name.replace(/\.php$/, '.encrypted.php'));
    fs.writeFileSync(inputPath, source);
    const result = await new Encryptor(MASTER_KEY, SALT).encryptFile(inputPath, outputPath, { renameVars: false });
    if (!result.success) throw new Error(result.error);
    return outputPath;
  }

  it('decrypts a stub to the original source', async () => {
    const stubPath = await encryptTo('app.php', '<?php echo "hello";');
    const outputPath = path.join(tmpDir, 'dec', 'app.php');

    const result = await new Decryptor(MASTER_KEY).decryptFile(stubPath, outputPath);

    expect(result).toEqual({
      success: true,
      inputPath: stubPath,
      outputPath,
      originalIdentifier: 'app.php',
      decryptedSize: 19,
      chunksCount: 1,
    });
    expect(fs.readFileSync(outputPath, 'utf-8')).toBe('<?php echo "hello";');
  });

  it('uses an explicit original identifier', async () => {
    const stubPath = await encryptTo('app.php', '<?php echo 1;');
    const renamed = path.join(tmpDir, 'renamed.txt');
    fs.renameSync(stubPath, renamed);

    const result = await new Decryptor(MASTER_KEY).decryptFile(renamed, path.join(tmpDir, 'out.php'), {
      originalIdentifier: 'app.php',
    });

    expect(result.success).toBe(true);
  });

  it('reports the wrong key as a crypto_error result and writes nothing', async () => {
    const stubPath = await encryptTo('app.php', '<?php echo 1;');
    const outputPath = path.join(tmpDir, 'dec', 'app.php');

    const result = await new Decryptor(OTHER_KEY).decryptFile(stubPath, outputPath);

    expect(result.success ? undefined : result.code).toBe('crypto_error');
    expect(fs.existsSync(outputPath)).toBe(false);
  });

  it('reports a plain PHP file as a format_error result', async () => {
    const inputPath = path.join(tmpDir, 'plain.php');
    fs.writeFileSync(inputPath, '<?php echo 1;');

    const result = await new Decryptor(MASTER_KEY).decryptFile(inputPath, path.join(tmpDir, 'out.php'));

    expect(result).toEqual({
      success: false,
      inputPath,
      error: 'Artifact is missing field(s): fileKey, salt, integrityHash, chunks',
      code: 'format_error',
    });
  });

  it('validates files on disk', async () => {
    const stubPath = await encryptTo('app.php', '<?php echo 1;');
    const decryptor = new Decryptor(MASTER_KEY);

    expect(decryptor.validateFile(stubPath)).toBe(true);
    expect(validateArtifactFile(path.join(tmpDir, 'app.php'))).toBe(false);
    expect(validateArtifactFile(path.join(tmpDir, 'missing.php'))).toBe(false);
  });
});
