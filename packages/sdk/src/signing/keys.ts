/**
 * RSA key pair generation, import and export using Node.js built-in crypto.
 *
 * @module signing/keys
 */

import {
  createHash,
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  type KeyObject,
} from 'node:crypto';
import {
  KEY_SIZE_BITS,
  KeyGenerationError,
  KeyParseError,
  type ExportPrivateKeyOptions,
  type ExportPublicKeyOptions,
  type KeyMaterial,
  type KeyPair,
  type OperationOptions,
  type PrivateKey,
  type PublicKey,
} from './types.js';

const RSA_PUBLIC_EXPONENT = 0x10001;
const PEM_MARKER = '-----BEGIN';

type DecodedMaterial = { kind: 'pem'; text: string } | { kind: 'der'; der: Buffer };

/**
 * Generate a new RSA-2048 key pair.
 *
 * @throws KeyGenerationError if the platform cannot produce a key
 */
export function generateKeyPair(options: OperationOptions = {}): KeyPair {
  let generated: { publicKey: KeyObject; privateKey: KeyObject };
  try {
    generated = generateKeyPairSync('rsa', {
      modulusLength: KEY_SIZE_BITS,
      publicExponent: RSA_PUBLIC_EXPONENT,
    });
  } catch (err) {
    throw new KeyGenerationError(`RSA key generation failed: ${errorMessage(err)}`, { cause: err });
  }

  const keyPair: KeyPair = Object.freeze({
    privateKey: wrapPrivateKey(generated.privateKey),
    publicKey: wrapPublicKey(generated.publicKey),
  });
  options.logger?.info('Generated RSA key pair', {
    bits: KEY_SIZE_BITS,
    keyId: deriveKeyId(keyPair.publicKey),
  });
  return keyPair;
}

/**
 * Import an RSA private key.
 *
 * Accepts PKCS#1 or PKCS#8 PEM (unencrypted), the same structures as DER
 * bytes, or a base64 string of the DER bytes.
 *
 * @throws KeyParseError if the material is not an RSA private key
 */
export function importPrivateKey(material: KeyMaterial, options: OperationOptions = {}): PrivateKey {
  const decoded = decodeMaterial(material, 'private');
  let keyObject: KeyObject;
  try {
    keyObject =
      decoded.kind === 'pem'
        ? createPrivateKey({ key: decoded.text, format: 'pem' })
        : parseDer(decoded.der, [
            (der) => createPrivateKey({ key: der, format: 'der', type: 'pkcs8' }),
            (der) => createPrivateKey({ key: der, format: 'der', type: 'pkcs1' }),
          ]);
  } catch (err) {
    throw new KeyParseError(`Invalid private key: ${errorMessage(err)}`, { cause: err });
  }

  const key = wrapPrivateKey(keyObject);
  options.logger?.debug('Imported private key', { bits: key.modulusBits });
  return key;
}

/**
 * Import an RSA public key.
 *
 * Accepts SPKI or PKCS#1 PEM, the same structures as DER bytes, or a base64
 * string of the DER bytes. A private key PEM is accepted as well and yields
 * its public half.
 *
 * @throws KeyParseError if the material is not an RSA public key
 */
export function importPublicKey(material: KeyMaterial, options: OperationOptions = {}): PublicKey {
  const decoded = decodeMaterial(material, 'public');
  let keyObject: KeyObject;
  try {
    keyObject =
      decoded.kind === 'pem'
        ? createPublicKey({ key: decoded.text, format: 'pem' })
        : parseDer(decoded.der, [
            (der) => createPublicKey({ key: der, format: 'der', type: 'spki' }),
            (der) => createPublicKey({ key: der, format: 'der', type: 'pkcs1' }),
          ]);
  } catch (err) {
    throw new KeyParseError(`Invalid public key: ${errorMessage(err)}`, { cause: err });
  }

  const key = wrapPublicKey(keyObject);
  options.logger?.debug('Imported public key', { bits: key.modulusBits, keyId: deriveKeyId(key) });
  return key;
}

/**
 * Serialize a private key to PEM.
 */
export function exportPrivateKey(key: PrivateKey, options: ExportPrivateKeyOptions = {}): string {
  const exported = key.keyObject.export({ type: options.format ?? 'pkcs1', format: 'pem' });
  return typeof exported === 'string' ? exported : exported.toString('utf-8');
}

/**
 * Serialize a public key to PEM.
 */
export function exportPublicKey(key: PublicKey, options: ExportPublicKeyOptions = {}): string {
  const exported = key.keyObject.export({ type: options.format ?? 'spki', format: 'pem' });
  return typeof exported === 'string' ? exported : exported.toString('utf-8');
}

export function derivePublicKey(privateKey: PrivateKey): PublicKey {
  return wrapPublicKey(createPublicKey(privateKey.keyObject));
}

/**
 * Compare two keys by key material.
 */
export function keysEqual(a: PrivateKey | PublicKey, b: PrivateKey | PublicKey): boolean {
  return a.type === b.type && a.keyObject.equals(b.keyObject);
}

/**
 * SHA-256 hex digest of the SPKI DER encoding of a public key.
 */
export function keyFingerprint(publicKey: PublicKey): string {
  const der = publicKey.keyObject.export({ type: 'spki', format: 'der' });
  return createHash('sha256').update(der).digest('hex');
}

/**
 * Short key identifier: the first 16 hex characters of the fingerprint.
 */
export function deriveKeyId(publicKey: PublicKey): string {
  return keyFingerprint(publicKey).slice(0, 16);
}

function wrapPrivateKey(keyObject: KeyObject): PrivateKey {
  if (keyObject.type !== 'private') {
    throw new KeyParseError(`Expected a private key, got a ${keyObject.type} key`);
  }
  return Object.freeze({ type: 'private', keyObject, modulusBits: rsaModulusBits(keyObject) });
}

function wrapPublicKey(keyObject: KeyObject): PublicKey {
  if (keyObject.type !== 'public') {
    throw new KeyParseError(`Expected a public key, got a ${keyObject.type} key`);
  }
  return Object.freeze({ type: 'public', keyObject, modulusBits: rsaModulusBits(keyObject) });
}

function rsaModulusBits(keyObject: KeyObject): number {
  if (keyObject.asymmetricKeyType !== 'rsa') {
    throw new KeyParseError(
      `Unsupported key type "${keyObject.asymmetricKeyType ?? 'unknown'}"; expected RSA`
    );
  }
  const bits = keyObject.asymmetricKeyDetails?.modulusLength;
  if (bits === undefined) {
    throw new KeyParseError('RSA key is missing its modulus length');
  }
  return bits;
}

function decodeMaterial(material: KeyMaterial, kind: 'private' | 'public'): DecodedMaterial {
  if (material.length === 0) {
    throw new KeyParseError(`Empty ${kind} key material`);
  }

  if (typeof material === 'string') {
    if (material.includes(PEM_MARKER)) {
      return { kind: 'pem', text: material };
    }
    const compact = material.replace(/\s+/g, '');
    if (!/^[A-Za-z0-9+/]+={0,2}$/.test(compact)) {
      throw new KeyParseError(`Invalid ${kind} key: expected PEM text or base64-encoded DER`);
    }
    return { kind: 'der', der: Buffer.from(compact, 'base64') };
  }

  const bytes = Buffer.from(material);
  const text = bytes.toString('latin1');
  if (text.includes(PEM_MARKER)) {
    return { kind: 'pem', text };
  }
  return { kind: 'der', der: bytes };
}

/**
 * Try each DER structure in turn, rethrowing the first failure if none fits.
 */
function parseDer(der: Buffer, parsers: Array<(der: Buffer) => KeyObject>): KeyObject {
  let firstError: unknown;
  for (const parse of parsers) {
    try {
      return parse(der);
    } catch (err) {
      firstError ??= err;
    }
  }
  throw firstError;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
