import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';

export const FIXTURES_DIR = fileURLToPath(new URL('../fixtures/', import.meta.url));

export function fixturePath(name: string): string {
  return join(FIXTURES_DIR, name);
}

export function readFixture(name: string): string {
  return readFileSync(fixturePath(name), 'utf-8');
}

/** SHA-256 of the SPKI DER of public_key.pem */
export const FIXTURE_FINGERPRINT = '53fd812f74ea455c43ba36b527ffe59bf7dbf7087463166f3e7be5cb18e4bb45';

/** SHA-256 of "hello world" */
export const HELLO_WORLD_SHA256 = 'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9';
