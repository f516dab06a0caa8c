/**
 * Global CLI options and the services built from them
 *
 * @license Apache-2.0
 */

import type { Command } from 'commander';
import { createAvailableCertificateAuthority } from '../../../src/lib/certs/CertificateAuthorityFactory';
import type { CertificateAuthority } from '../../../src/lib/certs/CertificateAuthority';
import { getCertBackendConfigFromEnv } from '../../../src/lib/config';

export type GlobalOptions = {
  backend?: string;
  opensslBin?: string;
};

export function globalOptions(command: Command): GlobalOptions {
  let root = command;
  while (root.parent) {
    root = root.parent;
  }
  return root.opts<GlobalOptions>();
}

export async function certificateAuthorityFor(command: Command): Promise<CertificateAuthority> {
  const fromEnv = getCertBackendConfigFromEnv();
  const opts = globalOptions(command);
  return createAvailableCertificateAuthority({
    backend: opts.backend || fromEnv.backend,
    opensslBin: opts.opensslBin || fromEnv.opensslBin,
  });
}
