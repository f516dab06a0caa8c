/**
 * Read back a connector's key material
 *
 * Used after provisioning to confirm the certificate carries the expected
 * common name and belongs to the private key next to it.
 *
 * @license Apache-2.0
 */

import * as crypto from 'crypto';
import * as fs from 'fs/promises';
import { resolveArtifacts, isFile } from './artifacts';
import { ProvisioningError } from '../errors';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface KeyMaterialReport {
  certPath: string;
  /** Subject CN, or null if the subject has none */
  commonName: string | null;
  subject: string;
  notBefore: Date;
  notAfter: Date;
  /** Length of the validity window in whole days */
  validityDays: number;
  fingerprint256: string;
  selfSigned: boolean;
  /** Null when key.pem is absent */
  keyMatches: boolean | null;
}

export async function inspectKeyMaterial(certDir: string): Promise<KeyMaterialReport> {
  const artifacts = resolveArtifacts(certDir);
  if (!(await isFile(artifacts.certPath))) {
    throw new ProvisioningError(
      'MISSING_ARTIFACT',
      `Error: Certificate files not found in ${artifacts.certDir}`
    );
  }

  const cert = new crypto.X509Certificate(await fs.readFile(artifacts.certPath));
  const notBefore = new Date(cert.validFrom);
  const notAfter = new Date(cert.validTo);

  let keyMatches: boolean | null = null;
  if (await isFile(artifacts.keyPath)) {
    const privateKey = crypto.createPrivateKey(await fs.readFile(artifacts.keyPath));
    keyMatches = cert.checkPrivateKey(privateKey);
  }

  return {
    certPath: artifacts.certPath,
    commonName: extractCommonName(cert.subject),
    subject: cert.subject,
    notBefore,
    notAfter,
    validityDays: Math.round((notAfter.getTime() - notBefore.getTime()) / DAY_MS),
    fingerprint256: cert.fingerprint256,
    selfSigned: cert.subject === cert.issuer,
    keyMatches,
  };
}

/**
 * Node renders distinguished names one attribute per line (`CN=name`).
 */
export function extractCommonName(subject: string): string | null {
  for (const line of subject.split('\n')) {
    if (line.startsWith('CN=')) {
      return unescapeDistinguishedNameValue(line.slice(3));
    }
  }
  return null;
}

/**
 * Undo RFC 2253 escaping: `\X` is the literal character X, `\XX` a hex
 * encoded byte. Consecutive hex bytes may form one UTF-8 sequence.
 */
export function unescapeDistinguishedNameValue(value: string): string {
  const bytes: number[] = [];
  let i = 0;
  while (i < value.length) {
    const ch = value[i];
    if (ch === '\\' && i + 1 < value.length) {
      const hex = value.slice(i + 1, i + 3);
      if (/^[0-9A-Fa-f]{2}$/.test(hex)) {
        bytes.push(parseInt(hex, 16));
        i += 3;
        continue;
      }
      bytes.push(...Buffer.from(value[i + 1], 'utf-8'));
      i += 2;
      continue;
    }
    const codePoint = value.codePointAt(i) ?? 0;
    const char = String.fromCodePoint(codePoint);
    bytes.push(...Buffer.from(char, 'utf-8'));
    i += char.length;
  }
  return Buffer.from(bytes).toString('utf-8');
}
