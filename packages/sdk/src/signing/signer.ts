/**
 * RSA PKCS#1 v1.5 / SHA-256 document signing using Node.js built-in crypto.
 *
 * @module signing/signer
 */

import { constants, createHash, createSign, sign } from 'node:crypto';
import {
  DIGEST_ALGORITHM,
  SigningError,
  type DocumentInput,
  type DocumentStream,
  type OperationOptions,
  type PrivateKey,
} from './types.js';

/**
 * Sign a document with an RSA private key.
 *
 * The signature is deterministic: the same document and key always give
 * the same bytes.
 *
 * @param document - Document bytes (strings are signed as UTF-8)
 * @param privateKey - Imported or generated RSA private key
 * @returns Raw signature bytes, one modulus in length
 * @throws SigningError if the key is unusable or the crypto call fails
 */
export function signDocument(
  document: DocumentInput,
  privateKey: PrivateKey,
  options: OperationOptions = {}
): Buffer {
  assertSigningKey(privateKey);
  const data = toBuffer(document);

  let signature: Buffer;
  try {
    signature = sign(DIGEST_ALGORITHM, data, {
      key: privateKey.keyObject,
      padding: constants.RSA_PKCS1_PADDING,
    });
  } catch (err) {
    throw new SigningError(`Signing failed: ${errorMessage(err)}`, { cause: err });
  }

  options.logger?.debug('Signed document', { bytes: data.length, signatureBytes: signature.length });
  return signature;
}

/**
 * Sign a document delivered in chunks.
 *
 * Chunks are fed into the digest as they arrive, so the document is never
 * held in memory as a whole.
 *
 * @throws SigningError if the key is unusable or reading the source fails
 */
export async function signStream(
  source: DocumentStream,
  privateKey: PrivateKey,
  options: OperationOptions = {}
): Promise<Buffer> {
  assertSigningKey(privateKey);
  const signer = createSign(DIGEST_ALGORITHM);

  let total = 0;
  try {
    for await (const chunk of source) {
      const data = toBuffer(chunk);
      total += data.length;
      signer.update(data);
    }
  } catch (err) {
    throw new SigningError(`Failed to read document: ${errorMessage(err)}`, { cause: err });
  }

  let signature: Buffer;
  try {
    signature = signer.sign({ key: privateKey.keyObject, padding: constants.RSA_PKCS1_PADDING });
  } catch (err) {
    throw new SigningError(`Signing failed: ${errorMessage(err)}`, { cause: err });
  }

  options.logger?.debug('Signed document stream', { bytes: total, signatureBytes: signature.length });
  return signature;
}

/**
 * Encode raw signature bytes as newline-free base64.
 */
export function encodeSignature(signature: Uint8Array): string {
  return Buffer.from(signature).toString('base64');
}

/**
 * Compute the SHA-256 hex digest of a document.
 */
export function sha256Hex(document: DocumentInput): string {
  return createHash(DIGEST_ALGORITHM).update(toBuffer(document)).digest('hex');
}

export function toBuffer(document: DocumentInput): Buffer {
  return typeof document === 'string' ? Buffer.from(document, 'utf-8') : Buffer.from(document);
}

function assertSigningKey(privateKey: PrivateKey): void {
  if (privateKey.keyObject.type !== 'private') {
    throw new SigningError(`Signing requires a private key, got a ${privateKey.keyObject.type} key`);
  }
  if (privateKey.keyObject.asymmetricKeyType !== 'rsa') {
    throw new SigningError(
      `Signing requires an RSA key, got "${privateKey.keyObject.asymmetricKeyType ?? 'unknown'}"`
    );
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
