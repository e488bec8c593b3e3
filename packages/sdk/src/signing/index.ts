/**
 * Document signing module.
 *
 * @module signing
 */

export type {
  PrivateKey,
  PublicKey,
  KeyPair,
  KeyMaterial,
  DocumentInput,
  DocumentStream,
  PrivateKeyFormat,
  PublicKeyFormat,
  ExportPrivateKeyOptions,
  ExportPublicKeyOptions,
  OperationOptions,
} from './types.js';
export {
  KEY_SIZE_BITS,
  DIGEST_ALGORITHM,
  SIGNATURE_ALGORITHM,
  KeyGenerationError,
  KeyParseError,
  SigningError,
  SignatureFileError,
} from './types.js';
export {
  generateKeyPair,
  importPrivateKey,
  importPublicKey,
  exportPrivateKey,
  exportPublicKey,
  derivePublicKey,
  keysEqual,
  keyFingerprint,
  deriveKeyId,
} from './keys.js';
export { signDocument, signStream, encodeSignature, sha256Hex } from './signer.js';
export { verifyDocument, verifyStream, decodeSignature } from './verifier.js';
export {
  SIGNATURE_SUFFIX,
  sidecarPath,
  writeSignatureFile,
  readSignatureFile,
} from './sidecar.js';
