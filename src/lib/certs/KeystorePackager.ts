/**
 * Keystore Packager
 *
 * Bundles a connector's key material into `cert.pfx`. Alias and password are
 * fixed: the Java connector runtime is configured to open the keystore with
 * KEYSTORE_ALIAS / KEYSTORE_PASSWORD.
 *
 * @license Apache-2.0
 */

import type { CertificateAuthority } from './CertificateAuthority';
import { allFilesExist, resolveArtifacts } from './artifacts';
import { KEYSTORE_ALIAS, KEYSTORE_PASSWORD } from '../config';
import { ProvisioningError, usageError } from '../errors';

export const PACKAGE_USAGE = 'certs package <cert_dir>';

export class KeystorePackager {
  constructor(private ca: CertificateAuthority) {}

  /**
   * @returns Path of the written keystore
   * @throws ProvisioningError (MISSING_ARTIFACT) if key.pem or cert.pem is absent;
   *   no keystore is written in that case
   */
  async package(certDir: string): Promise<string> {
    if (!certDir.trim()) {
      throw usageError(PACKAGE_USAGE);
    }

    const artifacts = resolveArtifacts(certDir);
    if (!(await allFilesExist([artifacts.keyPath, artifacts.certPath]))) {
      throw new ProvisioningError(
        'MISSING_ARTIFACT',
        `Error: Key material not found in ${artifacts.certDir} (expected key.pem and cert.pem)`
      );
    }

    await this.ca.exportPkcs12({
      keyPath: artifacts.keyPath,
      certPath: artifacts.certPath,
      outPath: artifacts.keystorePath,
      alias: KEYSTORE_ALIAS,
      password: KEYSTORE_PASSWORD,
    });

    return artifacts.keystorePath;
  }
}
