/**
 * CLI commands for key generation, public key export, signing and verification.
 *
 * @module cli/sign-commands
 */

import { createHash, type Hash } from 'node:crypto';
import { chmodSync, createReadStream, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import {
  deriveKeyId,
  derivePublicKey,
  exportPrivateKey,
  exportPublicKey,
  generateKeyPair,
  importPrivateKey,
  importPublicKey,
  keyFingerprint,
} from '../signing/keys.js';
import { encodeSignature, signStream } from '../signing/signer.js';
import { verifyStream } from '../signing/verifier.js';
import { readSignatureFile, sidecarPath, writeSignatureFile } from '../signing/sidecar.js';
import { DIGEST_ALGORITHM, type DocumentStream, type PublicKey } from '../signing/types.js';
import type { Logger } from '../utils/logger.js';
import type { LoadedDocsignConfig } from './config.js';

/**
 * What every command needs besides its own options.
 */
export interface CommandContext {
  config: LoadedDocsignConfig;
  logger: Logger;
}

export interface KeygenOptions {
  /** Directory to write keys to (default: the configured key directory) */
  outputDir?: string;
  /** Overwrite existing key files */
  force?: boolean;
  json?: boolean;
}

export interface KeygenResult {
  privateKeyPath: string;
  publicKeyPath: string;
  keyId: string;
  fingerprint: string;
}

/**
 * Generate a new RSA-2048 key pair and write both halves as PEM.
 *
 * @throws Error if a key file already exists and `force` is not set
 */
export function keygenCommand(options: KeygenOptions, context: CommandContext): KeygenResult {
  const { config, logger } = context;
  const privateKeyPath = options.outputDir
    ? join(resolve(options.outputDir), basename(config.privateKeyPath))
    : config.privateKeyPath;
  const publicKeyPath = options.outputDir
    ? join(resolve(options.outputDir), basename(config.publicKeyPath))
    : config.publicKeyPath;

  if (!options.force) {
    for (const path of [privateKeyPath, publicKeyPath]) {
      if (existsSync(path)) {
        throw new Error(`Refusing to overwrite ${path} (use --force)`);
      }
    }
  }

  const keyPair = generateKeyPair({ logger });
  mkdirSync(dirname(privateKeyPath), { recursive: true });
  mkdirSync(dirname(publicKeyPath), { recursive: true });

  writeFileSync(
    privateKeyPath,
    exportPrivateKey(keyPair.privateKey, { format: config.privateKeyFormat }),
    { encoding: 'utf-8', mode: 0o600 }
  );
  // mode only applies when the file is created
  chmodSync(privateKeyPath, 0o600);
  writeFileSync(publicKeyPath, exportPublicKey(keyPair.publicKey, { format: config.publicKeyFormat }), 'utf-8');

  const result: KeygenResult = {
    privateKeyPath,
    publicKeyPath,
    keyId: deriveKeyId(keyPair.publicKey),
    fingerprint: keyFingerprint(keyPair.publicKey),
  };
  logger.info('Wrote key pair', { keyId: result.keyId });

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log('Generated RSA-2048 key pair:');
    console.log(`  Private key: ${privateKeyPath}`);
    console.log(`  Public key:  ${publicKeyPath}`);
    console.log(`  Key ID:      ${result.keyId}`);
    console.log('');
    console.log('Share the public key with anyone who needs to verify your signatures.');
    console.log('Keep the private key secret.');
  }
  return result;
}

export interface PubkeyOptions {
  /** Private key to derive from (default: configured private key) */
  keyPath?: string;
  /** Write the PEM here instead of stdout */
  outputFile?: string;
  json?: boolean;
}

export interface PubkeyResult {
  publicKeyPem: string;
  keyId: string;
  outputFile: string | null;
}

/**
 * Export the public half of a private key.
 */
export function pubkeyCommand(options: PubkeyOptions, context: CommandContext): PubkeyResult {
  const keyPath = resolve(options.keyPath ?? context.config.privateKeyPath);
  if (!existsSync(keyPath)) {
    throw new Error(`Private key not found: ${keyPath}`);
  }

  const privateKey = importPrivateKey(readFileSync(keyPath), { logger: context.logger });
  const publicKey = derivePublicKey(privateKey);
  const publicKeyPem = exportPublicKey(publicKey, { format: context.config.publicKeyFormat });
  const outputFile = options.outputFile ? resolve(options.outputFile) : null;

  if (outputFile) {
    writeFileSync(outputFile, publicKeyPem, 'utf-8');
  }

  const result: PubkeyResult = { publicKeyPem, keyId: deriveKeyId(publicKey), outputFile };
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else if (outputFile) {
    console.log(`Public key written to ${outputFile}`);
    console.log(`  Key ID: ${result.keyId}`);
  } else {
    process.stdout.write(publicKeyPem);
  }
  return result;
}

export interface SignOptions {
  documentPath: string;
  /** Private key (default: configured private key) */
  keyPath?: string;
  /** Signature output (default: `<document>.sig`) */
  outputFile?: string;
  json?: boolean;
}

export interface SignResult {
  documentPath: string;
  outputFile: string;
  signature: string;
  documentHash: string;
  keyId: string;
}

/**
 * Sign a document and write the base64 signature next to it.
 */
export async function signCommand(options: SignOptions, context: CommandContext): Promise<SignResult> {
  const { logger } = context;
  const documentPath = resolve(options.documentPath);
  if (!existsSync(documentPath)) {
    throw new Error(`Document not found: ${documentPath}`);
  }
  const keyPath = resolve(options.keyPath ?? context.config.privateKeyPath);
  if (!existsSync(keyPath)) {
    throw new Error(`Private key not found: ${keyPath}`);
  }

  const privateKey = importPrivateKey(readFileSync(keyPath), { logger });
  const digest = createHash(DIGEST_ALGORITHM);
  const signature = await signStream(tapDigest(readDocument(documentPath), digest), privateKey, { logger });

  const outputFile = resolve(options.outputFile ?? sidecarPath(documentPath));
  writeSignatureFile(signature, outputFile);

  const result: SignResult = {
    documentPath,
    outputFile,
    signature: encodeSignature(signature),
    documentHash: digest.digest('hex'),
    keyId: deriveKeyId(derivePublicKey(privateKey)),
  };
  logger.info('Signed document', { document: documentPath, keyId: result.keyId });

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else {
    console.log('Document signed:');
    console.log(`  Document:  ${documentPath}`);
    console.log(`  SHA-256:   ${result.documentHash}`);
    console.log(`  Key ID:    ${result.keyId}`);
    console.log(`  Signature: ${outputFile}`);
    console.log('');
    console.log(result.signature);
  }
  return result;
}

export interface VerifyOptions {
  documentPath: string;
  /** Public key (default: configured public key) */
  keyPath?: string;
  /** Signature file (default: `<document>.sig`) */
  signaturePath?: string;
  /** Base64 signature given inline; takes precedence over signaturePath */
  signature?: string;
  json?: boolean;
}

export interface VerifyResult {
  valid: boolean;
  documentPath: string;
  keyId: string | null;
  /** Why no verdict could be reached (missing or unreadable inputs) */
  error?: string;
}

/**
 * Verify a document against a signature and public key.
 *
 * Missing or unusable inputs are reported and count as a failed
 * verification; a malformed signature is simply invalid.
 */
export async function verifyCommand(options: VerifyOptions, context: CommandContext): Promise<VerifyResult> {
  const { logger } = context;
  const documentPath = resolve(options.documentPath);
  const keyPath = resolve(options.keyPath ?? context.config.publicKeyPath);

  const fail = (error: string, keyId: string | null = null): VerifyResult => {
    const result: VerifyResult = { valid: false, documentPath, keyId, error };
    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.error(`Verification failed: ${error}`);
    }
    return result;
  };

  if (!existsSync(documentPath)) {
    return fail(`Document not found: ${documentPath}`);
  }
  if (!existsSync(keyPath)) {
    return fail(`Public key not found: ${keyPath}`);
  }

  let publicKey: PublicKey;
  try {
    publicKey = importPublicKey(readFileSync(keyPath), { logger });
  } catch (err) {
    return fail(err instanceof Error ? err.message : String(err));
  }
  const keyId = deriveKeyId(publicKey);

  let signature: string;
  if (options.signature !== undefined) {
    signature = options.signature;
  } else {
    try {
      signature = readSignatureFile(resolve(options.signaturePath ?? sidecarPath(documentPath)));
    } catch (err) {
      return fail(err instanceof Error ? err.message : String(err), keyId);
    }
  }

  const valid = await verifyStream(readDocument(documentPath), signature, publicKey, { logger });
  logger.info('Verified document', { document: documentPath, keyId, valid });

  const result: VerifyResult = { valid, documentPath, keyId };
  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else if (valid) {
    console.log('Signature is VALID. Document authenticity confirmed.');
    console.log(`  Document: ${documentPath}`);
    console.log(`  Key ID:   ${keyId}`);
  } else {
    console.log('Signature is INVALID. The document may have been tampered with.');
    console.log(`  Document: ${documentPath}`);
    console.log(`  Key ID:   ${keyId}`);
  }
  return result;
}

/**
 * Stream a file, opening it only once something starts reading.
 */
async function* readDocument(path: string): DocumentStream {
  yield* createReadStream(path);
}

/**
 * Pass chunks through unchanged while feeding them into `hash`.
 */
async function* tapDigest(source: DocumentStream, hash: Hash): DocumentStream {
  for await (const chunk of source) {
    hash.update(chunk);
    yield chunk;
  }
}
