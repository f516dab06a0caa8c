/**
 * Vault commands - connector vault.properties
 *
 * @license Apache-2.0
 */

import { Command } from 'commander';
import { VAULT_WRITE_USAGE, VaultPropertiesWriter } from '../../../src/lib/vault/VaultPropertiesWriter';
import { VAULT_MODES, parseVaultMode } from '../../../src/lib/vault/vault-properties';
import { usageError } from '../../../src/lib/errors';
import { runAction } from '../lib/run';

export function vaultCommand(program: Command) {
  const vault = program.command('vault').description('Connector vault properties');

  vault
    .command('write')
    .description('Write vault.properties from cert.pem (and key.pem in public-private mode)')
    .argument('[cert_dir]', 'Directory holding the connector PEM files')
    .argument('[connector_name]', 'Connector identity; dashboard_connector selects the dashboard API key')
    .option('-m, --mode <mode>', `Vault layout: ${VAULT_MODES.join(' | ')}`, 'public-only')
    .option('--fallback-api-key <key>', 'API key for identities other than dashboard_connector')
    .action(
      (
        certDir: string | undefined,
        connectorName: string | undefined,
        options: { mode?: string; fallbackApiKey?: string }
      ) =>
        runAction(async () => {
          if (!certDir || !connectorName) throw usageError(VAULT_WRITE_USAGE);

          const result = await new VaultPropertiesWriter().write(certDir, connectorName, {
            mode: parseVaultMode(options.mode),
            fallbackApiKey: options.fallbackApiKey,
          });

          console.log(`Generated vault.properties for ${connectorName}`);
          console.log(`Path: ${result.path}`);
          console.log(`Mode: ${result.mode}`);
        })
    );

  vault
    .command('show')
    .description('Print the decoded contents of vault.properties')
    .argument('[cert_dir]', 'Directory holding vault.properties')
    .action((certDir: string | undefined) =>
      runAction(async () => {
        if (!certDir) throw usageError('vault show <cert_dir>');

        const properties = await new VaultPropertiesWriter().read(certDir);
        console.log(`apikey: ${properties.apiKey}`);
        console.log('publickey:');
        console.log(properties.publicKey);
        if (properties.privateKey !== undefined) {
          console.log('datacellar: (private key present)');
        }
      })
    );
}
