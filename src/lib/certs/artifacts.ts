/**
 * File layout of a connector's cert directory
 *
 * @license Apache-2.0
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  CERTIFICATE_FILE,
  KEYSTORE_FILE,
  PRIVATE_KEY_FILE,
  VAULT_PROPERTIES_FILE,
} from '../config';

export interface ConnectorArtifacts {
  certDir: string;
  keyPath: string;
  certPath: string;
  keystorePath: string;
  vaultPropertiesPath: string;
}

export function resolveArtifacts(certDir: string): ConnectorArtifacts {
  const dir = path.resolve(certDir);
  return {
    certDir: dir,
    keyPath: path.join(dir, PRIVATE_KEY_FILE),
    certPath: path.join(dir, CERTIFICATE_FILE),
    keystorePath: path.join(dir, KEYSTORE_FILE),
    vaultPropertiesPath: path.join(dir, VAULT_PROPERTIES_FILE),
  };
}

export async function isFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (error) {
    return false;
  }
}

export async function allFilesExist(paths: string[]): Promise<boolean> {
  const results = await Promise.all(paths.map(isFile));
  return results.every(Boolean);
}
