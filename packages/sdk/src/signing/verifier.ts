/**
 * RSA PKCS#1 v1.5 / SHA-256 signature verification.
 *
 * Verification fails closed: malformed input of any kind yields `false`,
 * never an exception. The reason is only ever written to the logger.
 *
 * @module signing/verifier
 */

import { constants, createVerify, verify } from 'node:crypto';
import { toBuffer } from './signer.js';
import {
  DIGEST_ALGORITHM,
  type DocumentInput,
  type DocumentStream,
  type OperationOptions,
  type PublicKey,
} from './types.js';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Decode base64 signature text.
 *
 * Whitespace (line wrapping from a pasted value) is ignored; anything else
 * outside the base64 alphabet, or bad padding, yields `null`.
 */
export function decodeSignature(text: string): Buffer | null {
  const compact = text.replace(/\s+/g, '');
  if (compact.length === 0 || !BASE64_PATTERN.test(compact)) {
    return null;
  }
  return Buffer.from(compact, 'base64');
}

/**
 * Verify a signature over a document.
 *
 * @param document - Document bytes (strings are verified as UTF-8)
 * @param signature - Raw signature bytes or base64 text
 * @param publicKey - Signer's RSA public key
 * @returns true only if the signature matches the document's digest
 */
export function verifyDocument(
  document: DocumentInput,
  signature: Uint8Array | string,
  publicKey: PublicKey,
  options: OperationOptions = {}
): boolean {
  const signatureBytes = checkSignatureShape(signature, publicKey, options);
  if (!signatureBytes) return false;

  try {
    const valid = verify(
      DIGEST_ALGORITHM,
      toBuffer(document),
      { key: publicKey.keyObject, padding: constants.RSA_PKCS1_PADDING },
      signatureBytes
    );
    options.logger?.debug('Signature checked', { valid });
    return valid;
  } catch (err) {
    options.logger?.debug('Signature check raised', { reason: errorMessage(err) });
    return false;
  }
}

/**
 * Verify a signature over a document delivered in chunks.
 *
 * A failure while reading the source resolves to `false`. When the signature
 * is rejected up front the source is never read, and a Node stream passed as
 * the source is destroyed.
 */
export async function verifyStream(
  source: DocumentStream,
  signature: Uint8Array | string,
  publicKey: PublicKey,
  options: OperationOptions = {}
): Promise<boolean> {
  const signatureBytes = checkSignatureShape(signature, publicKey, options);
  if (!signatureBytes) {
    releaseSource(source);
    return false;
  }

  const verifier = createVerify(DIGEST_ALGORITHM);
  try {
    for await (const chunk of source) {
      verifier.update(toBuffer(chunk));
    }
  } catch (err) {
    options.logger?.warn('Failed to read document during verification', { reason: errorMessage(err) });
    return false;
  }

  try {
    const valid = verifier.verify(
      { key: publicKey.keyObject, padding: constants.RSA_PKCS1_PADDING },
      signatureBytes
    );
    options.logger?.debug('Signature checked', { valid });
    return valid;
  } catch (err) {
    options.logger?.debug('Signature check raised', { reason: errorMessage(err) });
    return false;
  }
}

/**
 * Decode the signature and check it fits the key. Returns null when the
 * verdict is already "invalid".
 */
function checkSignatureShape(
  signature: Uint8Array | string,
  publicKey: PublicKey,
  options: OperationOptions
): Buffer | null {
  if (publicKey.keyObject.asymmetricKeyType !== 'rsa') {
    options.logger?.debug('Rejecting signature: key is not RSA');
    return null;
  }

  const bytes = typeof signature === 'string' ? decodeSignature(signature) : Buffer.from(signature);
  if (!bytes) {
    options.logger?.debug('Rejecting signature: not valid base64');
    return null;
  }

  const expectedLength = Math.ceil(publicKey.modulusBits / 8);
  if (bytes.length !== expectedLength) {
    options.logger?.debug('Rejecting signature: wrong length', {
      length: bytes.length,
      expected: expectedLength,
    });
    return null;
  }
  return bytes;
}

function releaseSource(source: DocumentStream): void {
  if (isDestroyable(source)) {
    source.destroy();
  }
}

function isDestroyable(source: DocumentStream): source is DocumentStream & { destroy(): void } {
  return 'destroy' in source && typeof source.destroy === 'function';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
