/**
 * OpenSSL Backend Implementation
 *
 * Drives the `openssl` command-line tool, one process per operation:
 * - `openssl genpkey` for the RSA key
 * - `openssl req -x509` for the self-signed certificate
 * - `openssl pkcs12 -export` for the keystore the Java connector runtime loads
 *
 * Setup: any OpenSSL 1.1+ or 3.x on PATH, or OPENSSL_BIN pointing at one.
 *
 * @license Apache-2.0
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import type {
  CertificateAuthority,
  Pkcs12Options,
  SelfSignOptions,
} from '../CertificateAuthority';
import type { CertBackendConfig } from '../../config';
import { ProvisioningError } from '../../errors';

const execFileAsync = promisify(execFile);

export class OpenSslBackend implements CertificateAuthority {
  private opensslBin: string;

  constructor(config?: CertBackendConfig) {
    this.opensslBin = config?.opensslBin || process.env.OPENSSL_BIN || 'openssl';
  }

  getBackendType(): string {
    return 'openssl';
  }

  async isAvailable(): Promise<boolean> {
    try {
      await execFileAsync(this.opensslBin, ['version']);
      return true;
    } catch (error) {
      return false;
    }
  }

  async generatePrivateKey(keyPath: string): Promise<void> {
    await this.run(['genpkey', '-algorithm', 'RSA', '-out', keyPath]);
  }

  async selfSignCertificate(options: SelfSignOptions): Promise<void> {
    await this.run([
      'req',
      '-new',
      '-x509',
      '-utf8',
      '-key', options.keyPath,
      '-out', options.certPath,
      '-days', String(options.validityDays),
      '-subj', `/CN=${escapeSubjectValue(options.commonName)}`,
    ]);
  }

  async exportPkcs12(options: Pkcs12Options): Promise<void> {
    await this.run([
      'pkcs12',
      '-export',
      '-out', options.outPath,
      '-inkey', options.keyPath,
      '-in', options.certPath,
      '-name', options.alias,
      '-passout', `pass:${options.password}`,
    ]);
  }

  private async run(args: string[]): Promise<string> {
    try {
      const { stdout } = await execFileAsync(this.opensslBin, args);
      return stdout;
    } catch (error) {
      const stderr =
        typeof error === 'object' && error !== null && 'stderr' in error
          ? String(error.stderr).trim()
          : '';
      const reason = stderr || (error instanceof Error ? error.message : String(error));
      throw new ProvisioningError(
        'TOOL_FAILURE',
        `openssl ${args[0]} failed: ${reason}`,
        { args: redactPassword(args) }
      );
    }
  }
}

/**
 * Escape characters that `-subj` treats as RDN separators.
 */
export function escapeSubjectValue(value: string): string {
  return value.replace(/[\\/+]/g, (ch) => `\\${ch}`);
}

function redactPassword(args: string[]): string[] {
  return args.map((arg) => (arg.startsWith('pass:') ? 'pass:***' : arg));
}
