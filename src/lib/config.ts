/**
 * Configuration for connector provisioning and the integration probes
 *
 * Values come from the process environment. The CLI loads `.env.local` and
 * `.env` from the project root before anything here is read.
 *
 * @license Apache-2.0
 */

import { ConfigError } from './errors';

// Artifact file names inside a connector's cert directory
export const PRIVATE_KEY_FILE = 'key.pem';
export const CERTIFICATE_FILE = 'cert.pem';
export const KEYSTORE_FILE = 'cert.pfx';
export const VAULT_PROPERTIES_FILE = 'vault.properties';

// The connector runtime loads the keystore with these; do not change one without the other
export const KEYSTORE_ALIAS = 'datacellar';
export const KEYSTORE_PASSWORD = 'datacellar';

export const CERT_VALIDITY_DAYS = 365;

// Connector identities provisioned by the demo
export const DASHBOARD_CONNECTOR = 'dashboard_connector';
export const DSS_CONNECTOR = 'dss_connector';

export const DASHBOARD_API_KEY = 'dashboard-api-key';
export const DSS_API_KEY = 'dss-api-key';

export const DSS_BACKEND_KEY = 'dss-backend-key';

export type Env = Record<string, string | undefined>;

export interface CertBackendConfig {
  /** Backend type: 'openssl' */
  backend?: string;
  /** Path or name of the openssl binary */
  opensslBin?: string;
}

export function getCertBackendConfigFromEnv(env: Env = process.env): CertBackendConfig {
  return {
    backend: env.CERT_BACKEND || 'openssl',
    opensslBin: env.OPENSSL_BIN || 'openssl',
  };
}

/**
 * Read a non-negative integer from the environment.
 *
 * Empty and unset values fall back to `fallback`.
 */
export const MAX_PORT = 65535;

/** Largest wait a timer can hold (2^31 - 1 ms) in whole seconds. */
export const MAX_WAIT_SECONDS = 2147483;

export function readIntEnv(env: Env, name: string, fallback: number, max?: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return parseNonNegativeInt(raw, name, max);
}

export function parseNonNegativeInt(raw: string, name: string, max?: number): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(name, `${name} must be a non-negative integer, got "${raw}"`);
  }
  return assertAtMost(parseInt(trimmed, 10), name, max);
}

export function assertAtMost(value: number, name: string, max?: number): number {
  if (max !== undefined && value > max) {
    throw new ConfigError(name, `${name} must be at most ${max}, got "${value}"`);
  }
  return value;
}

export function readStringEnv(env: Env, name: string, fallback: string): string {
  const raw = env[name];
  return raw === undefined || raw === '' ? fallback : raw;
}
