/**
 * Vault Properties Writer
 *
 * Writes `vault.properties` for a connector from the PEM files in its cert
 * directory, and reads it back.
 *
 * @license Apache-2.0
 */

import * as fs from 'fs/promises';
import * as dotenv from 'dotenv';
import { isFile, resolveArtifacts } from '../certs/artifacts';
import { ProvisioningError, usageError } from '../errors';
import {
  API_KEY_PROPERTY,
  DEFAULT_VAULT_MODE,
  PRIVATE_KEY_PROPERTY,
  PUBLIC_KEY_PROPERTY,
  renderVaultProperties,
  selectApiKey,
  unescapePemValue,
  type VaultMode,
} from './vault-properties';

export const VAULT_WRITE_USAGE = 'vault write <cert_dir> <connector_name>';

export interface VaultWriteOptions {
  mode?: VaultMode;
  /** API key for identities other than the dashboard connector */
  fallbackApiKey?: string;
}

export interface VaultWriteResult {
  path: string;
  mode: VaultMode;
  apiKey: string;
}

export interface VaultProperties {
  publicKey: string;
  /** Present only in files written in `public-private` mode */
  privateKey?: string;
  apiKey: string;
}

export class VaultPropertiesWriter {
  /**
   * @throws ProvisioningError (USAGE) if either argument is blank
   * @throws ProvisioningError (MISSING_ARTIFACT) if a PEM file the mode needs is absent
   */
  async write(
    certDir: string,
    connectorName: string,
    options: VaultWriteOptions = {}
  ): Promise<VaultWriteResult> {
    if (!certDir.trim() || !connectorName.trim()) {
      throw usageError(VAULT_WRITE_USAGE);
    }

    const mode = options.mode ?? DEFAULT_VAULT_MODE;
    const artifacts = resolveArtifacts(certDir);

    const required = mode === 'public-private'
      ? [artifacts.certPath, artifacts.keyPath]
      : [artifacts.certPath];
    for (const file of required) {
      if (!(await isFile(file))) {
        throw new ProvisioningError(
          'MISSING_ARTIFACT',
          `Error: Certificate files not found in ${artifacts.certDir}`,
          { missing: file }
        );
      }
    }

    const certificatePem = await fs.readFile(artifacts.certPath, 'utf-8');
    const privateKeyPem = mode === 'public-private'
      ? await fs.readFile(artifacts.keyPath, 'utf-8')
      : undefined;
    const apiKey = selectApiKey(connectorName, options.fallbackApiKey);

    const content = renderVaultProperties(
      { connectorName, certificatePem, privateKeyPem, apiKey },
      mode
    );
    await fs.writeFile(artifacts.vaultPropertiesPath, content, 'utf-8');

    return { path: artifacts.vaultPropertiesPath, mode, apiKey };
  }

  /**
   * Parse a vault.properties file written by `write`, unescaping PEM values.
   */
  async read(certDir: string): Promise<VaultProperties> {
    const artifacts = resolveArtifacts(certDir);
    if (!(await isFile(artifacts.vaultPropertiesPath))) {
      throw new ProvisioningError(
        'MISSING_ARTIFACT',
        `Error: vault.properties not found in ${artifacts.certDir}`
      );
    }

    const parsed = dotenv.parse(await fs.readFile(artifacts.vaultPropertiesPath, 'utf-8'));
    const publicKey = parsed[PUBLIC_KEY_PROPERTY];
    const apiKey = parsed[API_KEY_PROPERTY];
    if (publicKey === undefined || apiKey === undefined) {
      throw new ProvisioningError(
        'MISSING_ARTIFACT',
        `Error: ${artifacts.vaultPropertiesPath} is missing ${PUBLIC_KEY_PROPERTY} or ${API_KEY_PROPERTY}`
      );
    }

    const privateKey = parsed[PRIVATE_KEY_PROPERTY];
    return {
      publicKey: unescapePemValue(publicKey),
      privateKey: privateKey === undefined ? undefined : unescapePemValue(privateKey),
      apiKey,
    };
  }
}
