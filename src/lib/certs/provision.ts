/**
 * Connector provisioning
 *
 * Produces a connector's complete identity in one pass: key material,
 * PKCS12 keystore, then vault properties. Steps run strictly in order and
 * the first failure aborts the run; files written by earlier steps are left
 * in place.
 *
 * @license Apache-2.0
 */

import type { CertificateAuthority } from './CertificateAuthority';
import { KeyMaterialGenerator } from './KeyMaterialGenerator';
import { KeystorePackager } from './KeystorePackager';
import { VaultPropertiesWriter, type VaultWriteOptions } from '../vault/VaultPropertiesWriter';
import { resolveArtifacts, type ConnectorArtifacts } from './artifacts';
import { consoleReporter, type Reporter } from '../reporter';
import { usageError } from '../errors';
import type { VaultMode } from '../vault/vault-properties';

export const PROVISION_USAGE = 'provision <cert_dir> <common_name>';

export interface ProvisionOptions extends VaultWriteOptions {
  certDir: string;
  commonName: string;
  reporter?: Reporter;
}

export interface ProvisionResult extends ConnectorArtifacts {
  commonName: string;
  vaultMode: VaultMode;
  apiKey: string;
}

export async function provisionConnector(
  ca: CertificateAuthority,
  options: ProvisionOptions
): Promise<ProvisionResult> {
  const { certDir, commonName } = options;
  const reporter = options.reporter ?? consoleReporter;

  if (!certDir.trim() || !commonName.trim()) {
    throw usageError(PROVISION_USAGE);
  }

  await new KeyMaterialGenerator(ca).generate(certDir, commonName);
  reporter.info(`Generated key and certificate for ${commonName}`);

  await new KeystorePackager(ca).package(certDir);
  reporter.info('Packaged PKCS12 keystore');

  const vault = await new VaultPropertiesWriter().write(certDir, commonName, {
    mode: options.mode,
    fallbackApiKey: options.fallbackApiKey,
  });
  reporter.info(`Generated vault.properties for ${commonName} (${vault.mode})`);

  const artifacts = resolveArtifacts(certDir);
  reporter.info(`Generated certificates for ${commonName} in ${artifacts.certDir}`);

  return {
    ...artifacts,
    commonName,
    vaultMode: vault.mode,
    apiKey: vault.apiKey,
  };
}
