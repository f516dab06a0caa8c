/**
 * Provision command - key material, keystore and vault properties in one go
 *
 * @license Apache-2.0
 */

import { Command } from 'commander';
import { PROVISION_USAGE, provisionConnector } from '../../../src/lib/certs/provision';
import { VAULT_MODES, parseVaultMode } from '../../../src/lib/vault/vault-properties';
import { usageError } from '../../../src/lib/errors';
import { certificateAuthorityFor } from '../lib/context';
import { runAction } from '../lib/run';

export function provisionCommand(program: Command) {
  program
    .command('provision')
    .description('Generate certificates, keystore and vault.properties for a connector')
    .argument('[cert_dir]', 'Output directory (created if missing)')
    .argument('[common_name]', 'Connector identity, used as certificate CN')
    .option('-m, --mode <mode>', `Vault layout: ${VAULT_MODES.join(' | ')}`, 'public-only')
    .option('--fallback-api-key <key>', 'API key for identities other than dashboard_connector')
    .action(
      (
        certDir: string | undefined,
        commonName: string | undefined,
        options: { mode?: string; fallbackApiKey?: string },
        command: Command
      ) =>
        runAction(async () => {
          if (!certDir || !commonName) throw usageError(PROVISION_USAGE);

          const mode = parseVaultMode(options.mode);
          const ca = await certificateAuthorityFor(command);
          await provisionConnector(ca, {
            certDir,
            commonName,
            mode,
            fallbackApiKey: options.fallbackApiKey,
          });
        })
    );
}
