#!/usr/bin/env tsx
/**
 * Provision both demo connectors under one root directory:
 * `<root>/dashboard_connector` and `<root>/dss_connector`.
 *
 * Env: `CERTS_ROOT` (default `./certs`), `VAULT_MODE` (default `public-only`),
 * `OPENSSL_BIN`
 * Run: `npx tsx scripts/provision-connectors.ts [root]`
 *
 * @license Apache-2.0
 */

import * as dotenv from 'dotenv';
import * as path from 'path';

dotenv.config({ path: path.join(process.cwd(), '.env.local') });

import { createAvailableCertificateAuthority } from '../src/lib/certs/CertificateAuthorityFactory';
import { provisionConnector } from '../src/lib/certs/provision';
import { DASHBOARD_CONNECTOR, DSS_CONNECTOR, getCertBackendConfigFromEnv } from '../src/lib/config';
import { parseVaultMode } from '../src/lib/vault/vault-properties';
import { taggedReporter } from '../src/lib/reporter';

async function main() {
  const root = path.resolve(process.argv[2] || process.env.CERTS_ROOT || 'certs');
  const mode = parseVaultMode(process.env.VAULT_MODE);
  const reporter = taggedReporter('provision');

  const ca = await createAvailableCertificateAuthority(getCertBackendConfigFromEnv());
  reporter.info(`Root: ${root}`);
  reporter.info(`Vault mode: ${mode}`);

  for (const connector of [DASHBOARD_CONNECTOR, DSS_CONNECTOR]) {
    await provisionConnector(ca, {
      certDir: path.join(root, connector),
      commonName: connector,
      mode,
      reporter,
    });
  }

  reporter.info('Done');
}

main().catch((e) => {
  console.error('[provision] Error:', e instanceof Error ? e.message : String(e));
  if (e instanceof Error && e.stack) {
    console.error(e.stack);
  }
  process.exit(1);
});
