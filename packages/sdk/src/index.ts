/**
 * docsign-sdk: RSA document signing and verification.
 *
 * - **signing**: key generation/import/export, signing, verification,
 *   signature sidecar files
 * - **cli**: the `docsign` command-line front end
 *
 * ```ts
 * import { generateKeyPair, signDocument, verifyDocument, encodeSignature } from 'docsign-sdk';
 *
 * const keys = generateKeyPair();
 * const signature = encodeSignature(signDocument(bytes, keys.privateKey));
 * verifyDocument(bytes, signature, keys.publicKey); // true
 * ```
 *
 * @module docsign-sdk
 */

export * from './signing/index.js';
export {
  createLogger,
  silentLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogContext,
} from './utils/logger.js';
