/**
 * Key Material Generator
 *
 * Creates the RSA private key and self-signed certificate that identify one
 * connector. Regeneration is destructive: existing `key.pem` and `cert.pem`
 * are overwritten without warning, and any keystore or vault properties built
 * from the old pair no longer match.
 *
 * @license Apache-2.0
 */

import * as fs from 'fs/promises';
import type { CertificateAuthority } from './CertificateAuthority';
import { resolveArtifacts } from './artifacts';
import { CERT_VALIDITY_DAYS } from '../config';
import { usageError } from '../errors';

export const GENERATE_USAGE = 'certs generate <cert_dir> <common_name>';

export interface KeyMaterialPaths {
  certDir: string;
  keyPath: string;
  certPath: string;
  commonName: string;
}

export class KeyMaterialGenerator {
  constructor(
    private ca: CertificateAuthority,
    private validityDays: number = CERT_VALIDITY_DAYS
  ) {}

  /**
   * @throws ProvisioningError (USAGE) if either argument is blank
   * @throws ProvisioningError (TOOL_FAILURE) if the toolchain fails
   */
  async generate(certDir: string, commonName: string): Promise<KeyMaterialPaths> {
    if (!certDir.trim() || !commonName.trim()) {
      throw usageError(GENERATE_USAGE);
    }

    const artifacts = resolveArtifacts(certDir);
    await fs.mkdir(artifacts.certDir, { recursive: true });

    await this.ca.generatePrivateKey(artifacts.keyPath);
    await this.ca.selfSignCertificate({
      keyPath: artifacts.keyPath,
      certPath: artifacts.certPath,
      commonName,
      validityDays: this.validityDays,
    });

    return {
      certDir: artifacts.certDir,
      keyPath: artifacts.keyPath,
      certPath: artifacts.certPath,
      commonName,
    };
  }
}
