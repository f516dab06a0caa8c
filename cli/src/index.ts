#!/usr/bin/env node

/**
 * Connector Kit CLI
 *
 * Provisions connector identities (key, certificate, PKCS12 keystore,
 * vault properties) and probes the running Dashboard/DSS demo
 *
 * @license Apache-2.0
 */

import { Command } from 'commander';
import * as dotenv from 'dotenv';
import * as path from 'path';
import { certsCommand } from './commands/certs';
import { vaultCommand } from './commands/vault';
import { provisionCommand } from './commands/provision';
import { probeCommand } from './commands/probe';
import { getCertBackendConfigFromEnv } from '../../src/lib/config';
import { loadProbeConfig, dashboardBaseUrl, dssBaseUrl } from '../../src/lib/probe/probe-config';
import { CLI_NAME, exitWithError, runAction } from './lib/run';
import type { GlobalOptions } from './lib/context';

// .env.local takes precedence over .env; neither overrides the real environment
const projectRoot = path.resolve(__dirname, '../..');
dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

const program = new Command();

program
  .name(CLI_NAME)
  .description('Connector identity provisioning and integration probes for the Dashboard/DSS dataspace demo')
  .version('0.1.0');

program.option(
  '-b, --backend <type>',
  'Certificate backend (default: CERT_BACKEND or openssl)'
);

program.option(
  '--openssl-bin <path>',
  'OpenSSL binary (default: OPENSSL_BIN or openssl)'
);

certsCommand(program);
vaultCommand(program);
provisionCommand(program);
probeCommand(program);

// Info command
program
  .command('info')
  .description('Show configuration')
  .action(() =>
    runAction(async () => {
      const certConfig = getCertBackendConfigFromEnv();
      const probeConfig = loadProbeConfig();
      const opts = program.opts<GlobalOptions>();
      console.log('Connector Kit Configuration:');
      console.log(`  Certificate backend: ${opts.backend || certConfig.backend}`);
      console.log(`  OpenSSL binary: ${opts.opensslBin || certConfig.opensslBin}`);
      console.log(`  Dashboard API: ${dashboardBaseUrl(probeConfig)}`);
      console.log(`  DSS API: ${dssBaseUrl(probeConfig)}`);
      console.log(`  Probe profile: ${probeConfig.profile.name}`);
      console.log(`  Wait time: ${probeConfig.waitSeconds}s`);
    })
  );

// Show help if no command
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch(exitWithError);
}
