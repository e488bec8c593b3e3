/**
 * Reading and writing detached signature files.
 *
 * A sidecar holds the base64 signature of one document, conventionally
 * stored next to it as `<document>.sig`.
 *
 * @module signing/sidecar
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { encodeSignature } from './signer.js';
import { SignatureFileError } from './types.js';

export const SIGNATURE_SUFFIX = '.sig';

/**
 * Default sidecar path for a document.
 */
export function sidecarPath(documentPath: string): string {
  return `${documentPath}${SIGNATURE_SUFFIX}`;
}

/**
 * Write a signature as base64 text, without a trailing newline.
 *
 * @param signature - Raw signature bytes
 * @param filePath - Output path (typically `<document>.sig`)
 */
export function writeSignatureFile(signature: Uint8Array, filePath: string): void {
  writeFileSync(filePath, encodeSignature(signature), 'utf-8');
}

/**
 * Read the base64 text of a signature file.
 *
 * The text is returned as-is apart from surrounding whitespace; decoding
 * is left to the verifier, which treats bad base64 as an invalid signature.
 *
 * @throws SignatureFileError if the file does not exist or cannot be read
 */
export function readSignatureFile(filePath: string): string {
  if (!existsSync(filePath)) {
    throw new SignatureFileError(`Signature file not found: ${filePath}`);
  }
  try {
    return readFileSync(filePath, 'utf-8').trim();
  } catch (err) {
    throw new SignatureFileError(
      `Failed to read signature file ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
}
