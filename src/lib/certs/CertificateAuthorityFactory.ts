/**
 * Certificate Authority Factory
 *
 * Creates the toolchain backend used to provision connector identities.
 *
 * Configuration priority:
 * 1. Explicit config parameter
 * 2. Environment variables (CERT_BACKEND, OPENSSL_BIN)
 * 3. Default: 'openssl'
 *
 * @license Apache-2.0
 */

import type { CertificateAuthority } from './CertificateAuthority';
import { OpenSslBackend } from './backends/OpenSslBackend';
import type { CertBackendConfig } from '../config';
import { ProvisioningError } from '../errors';

export function createCertificateAuthority(config?: CertBackendConfig): CertificateAuthority {
  const backendType = (config?.backend || process.env.CERT_BACKEND || 'openssl').toLowerCase();

  switch (backendType) {
    case 'openssl':
      return new OpenSslBackend(config);

    default:
      throw new ProvisioningError(
        'UNKNOWN_BACKEND',
        `Unknown certificate backend: "${backendType}". ` +
          `Supported backends: openssl. ` +
          `Set CERT_BACKEND or pass backend in config.`
      );
  }
}

/**
 * Create the backend and fail early when its toolchain is missing.
 */
export async function createAvailableCertificateAuthority(
  config?: CertBackendConfig
): Promise<CertificateAuthority> {
  const ca = createCertificateAuthority(config);
  if (!(await ca.isAvailable())) {
    throw new ProvisioningError(
      'TOOL_FAILURE',
      `Certificate backend "${ca.getBackendType()}" is not available. ` +
        'Install OpenSSL or set OPENSSL_BIN to its path.'
    );
  }
  return ca;
}
