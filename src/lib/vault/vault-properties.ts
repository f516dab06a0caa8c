/**
 * Vault properties encoding
 *
 * The connector reads its credentials from a Java properties file. PEM
 * values are stored on a single line: each line break becomes the literal
 * escape `\r\n`, which the properties parser turns back into a real line
 * break when the connector loads the file.
 *
 * @license Apache-2.0
 */

import { DASHBOARD_API_KEY, DASHBOARD_CONNECTOR, DSS_API_KEY } from '../config';
import { ConfigError } from '../errors';

/**
 * - `public-only`: the certificate and API key; the private key stays in the
 *   PKCS12 keystore and is referenced by path at runtime
 * - `public-private`: legacy layout that also embeds the private key as
 *   `datacellar`
 */
export type VaultMode = 'public-only' | 'public-private';

export const VAULT_MODES: readonly VaultMode[] = ['public-only', 'public-private'];

export const DEFAULT_VAULT_MODE: VaultMode = 'public-only';

export const PUBLIC_KEY_PROPERTY = 'publickey';
export const PRIVATE_KEY_PROPERTY = 'datacellar';
export const API_KEY_PROPERTY = 'apikey';

export interface VaultDocument {
  connectorName: string;
  certificatePem: string;
  /** Only rendered in `public-private` mode */
  privateKeyPem?: string;
  apiKey: string;
}

export function isVaultMode(value: string): value is VaultMode {
  return VAULT_MODES.some((mode) => mode === value);
}

export function parseVaultMode(value: string | undefined): VaultMode {
  if (value === undefined || value === '') {
    return DEFAULT_VAULT_MODE;
  }
  if (!isVaultMode(value)) {
    throw new ConfigError(
      'mode',
      `Unknown vault mode: "${value}". Supported modes: ${VAULT_MODES.join(', ')}`
    );
  }
  return value;
}

/**
 * Newlines go to a carriage-return sentinel first, then every carriage
 * return (sentinel or original) becomes the two escapes `\r\n`.
 */
export function escapePemValue(pem: string): string {
  return pem.replace(/\n/g, '\r').replace(/\r/g, '\\r\\n');
}

export function unescapePemValue(value: string): string {
  return value.replace(/\\r\\n/g, '\n');
}

/**
 * Only the exact dashboard identity gets the dashboard key; every other
 * name is treated as the DSS connector.
 */
export function selectApiKey(connectorName: string, fallbackApiKey: string = DSS_API_KEY): string {
  return connectorName === DASHBOARD_CONNECTOR ? DASHBOARD_API_KEY : fallbackApiKey;
}

export function renderVaultProperties(doc: VaultDocument, mode: VaultMode): string {
  const lines = [
    `# ${doc.connectorName} Connector Vault Configuration`,
    '# Certificate for token verification (PEM format with escaped newlines)',
    `${PUBLIC_KEY_PROPERTY}=${escapePemValue(doc.certificatePem)}`,
    '',
  ];

  if (mode === 'public-private') {
    if (doc.privateKeyPem === undefined) {
      throw new Error('public-private vault mode requires the private key');
    }
    lines.push(
      '# Private key for token signing (PEM format with escaped newlines)',
      `${PRIVATE_KEY_PROPERTY}=${escapePemValue(doc.privateKeyPem)}`,
      ''
    );
  }

  lines.push(
    '# API key for management API authentication',
    `${API_KEY_PROPERTY}=${doc.apiKey}`,
    ''
  );

  return lines.join('\n');
}
