/**
 * Certs commands - key material and keystore
 *
 * @license Apache-2.0
 */

import { Command } from 'commander';
import { GENERATE_USAGE, KeyMaterialGenerator } from '../../../src/lib/certs/KeyMaterialGenerator';
import { KeystorePackager, PACKAGE_USAGE } from '../../../src/lib/certs/KeystorePackager';
import { inspectKeyMaterial } from '../../../src/lib/certs/inspect';
import { usageError } from '../../../src/lib/errors';
import { certificateAuthorityFor } from '../lib/context';
import { runAction } from '../lib/run';

export function certsCommand(program: Command) {
  const certs = program.command('certs').description('Connector key material and PKCS12 keystore');

  certs
    .command('generate')
    .description('Generate an RSA key and a self-signed certificate (overwrites existing files)')
    .argument('[cert_dir]', 'Output directory (created if missing)')
    .argument('[common_name]', 'Certificate subject CN, usually the connector name')
    .action((certDir: string | undefined, commonName: string | undefined, _options: unknown, command: Command) =>
      runAction(async () => {
        if (!certDir || !commonName) throw usageError(GENERATE_USAGE);

        const ca = await certificateAuthorityFor(command);
        const result = await new KeyMaterialGenerator(ca).generate(certDir, commonName);

        console.log(`Private key: ${result.keyPath}`);
        console.log(`Certificate: ${result.certPath}`);
        console.log(`Generated key material for ${commonName} in ${result.certDir}`);
      })
    );

  certs
    .command('package')
    .description('Package key.pem and cert.pem into cert.pfx')
    .argument('[cert_dir]', 'Directory holding key.pem and cert.pem')
    .action((certDir: string | undefined, _options: unknown, command: Command) =>
      runAction(async () => {
        if (!certDir) throw usageError(PACKAGE_USAGE);

        const ca = await certificateAuthorityFor(command);
        const keystorePath = await new KeystorePackager(ca).package(certDir);

        console.log(`Keystore: ${keystorePath}`);
      })
    );

  certs
    .command('inspect')
    .description('Show subject, validity and key match of a connector certificate')
    .argument('[cert_dir]', 'Directory holding cert.pem (and key.pem)')
    .option('--json', 'Output the report as JSON')
    .action((certDir: string | undefined, options: { json?: boolean }) =>
      runAction(async () => {
        if (!certDir) throw usageError('certs inspect <cert_dir>');

        const report = await inspectKeyMaterial(certDir);
        if (options.json) {
          console.log(JSON.stringify(report, null, 2));
          return;
        }

        console.log(`Certificate: ${report.certPath}`);
        console.log(`Common name: ${report.commonName ?? '(none)'}`);
        console.log(`Valid from: ${report.notBefore.toISOString()}`);
        console.log(`Valid to: ${report.notAfter.toISOString()} (${report.validityDays} days)`);
        console.log(`Self-signed: ${report.selfSigned}`);
        console.log(`SHA-256: ${report.fingerprint256}`);
        console.log(`Key match: ${report.keyMatches === null ? 'key.pem not found' : report.keyMatches}`);
      })
    );
}
