// -- Errors ---

export {
  IOError,
  FormatError,
  CryptoError,
  IntegrityError,
  ValidationError,
  isSourcelockError,
  describeError,
} from './errors.js';
export type { ErrorCode, SourcelockError } from './errors.js';

// -- Keys ---

export {
  generateMasterKey,
  generateFileKey,
  buildKeyPackage,
  saveKeyPackage,
  loadKeyPackage,
  decodeKeyPackage,
  generateKeyPackage,
  wipeKey,
  keyPackageSchema,
  KEY_LENGTH,
  SALT_LENGTH,
  MASTER_KEY_ITERATIONS,
  FILE_KEY_ITERATIONS,
} from './key-manager.js';
export type { KeyPackage, MasterKeyResult, GeneratedKeyPackage, DecodedKeyPackage } from './key-manager.js';

// -- Source analysis and renaming ---

export { PhpTokenizer, tokenize, scanRegions, getCodeStatistics } from './tokenizer.js';
export type {
  TokenizedSource,
  SourceScanner,
  SourceRegion,
  RegionKind,
  IdentifierToken,
  StringToken,
  CommentToken,
  CodeStatistics,
} from './tokenizer.js';
export { Obfuscator, DEFAULT_OBFUSCATE_OPTIONS, resolveObfuscateOptions } from './obfuscator.js';
export type { ObfuscateOptions, MappingSnapshot, IdentifierNamespace, RandomInt } from './obfuscator.js';
export { Lexicon, loadLexicon } from './lexicon.js';

// -- Encryption ---

export { CipherEngine, NONCE_LENGTH, AUTH_TAG_LENGTH } from './cipher-engine.js';
export type { SealedChunk } from './cipher-engine.js';
export { serializeArtifact, parseArtifact, ARTIFACT_MARKER } from './artifact.js';
export type { Artifact, ArtifactChunk } from './artifact.js';
export { encrypt, Encryptor, DEFAULT_CHUNK_SIZE } from './encryptor.js';
export type { EncryptOptions, EncryptFileOptions, EncryptFileResult, EncryptorDeps } from './encryptor.js';
export {
  decrypt,
  decryptArtifact,
  Decryptor,
  validateArtifact,
  validateArtifactFile,
  inferOriginalIdentifier,
} from './decryptor.js';
export type { DecryptFileOptions, DecryptFileResult } from './decryptor.js';

// -- Batches and configuration ---

export { encryptBatch, decryptBatch, encryptedOutputPath, decryptedOutputPath } from './batch.js';
export type {
  EncryptBatchOptions,
  DecryptBatchOptions,
  EncryptBatchSummary,
  DecryptBatchSummary,
  BatchSummary,
} from './batch.js';
export { resolveConfig, DEFAULT_OUTPUT_DIR } from './config.js';
export type { CliOptions, SourcelockConfig } from './config.js';
