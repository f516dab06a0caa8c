/**
 * Tests for KeystorePackager
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { KeystorePackager } from '../KeystorePackager';
import { KeyMaterialGenerator } from '../KeyMaterialGenerator';
import { ProvisioningError } from '../../errors';
import {
  FAKE_KEYSTORE_BYTES,
  FakeCertificateAuthority,
} from '../../../test/fakes/FakeCertificateAuthority';

describe('KeystorePackager', () => {
  let certDir: string;
  let ca: FakeCertificateAuthority;

  beforeEach(async () => {
    certDir = await fs.mkdtemp(path.join(os.tmpdir(), 'connector-kit-pfx-'));
    ca = new FakeCertificateAuthority();
  });

  afterEach(async () => {
    await fs.rm(certDir, { recursive: true, force: true });
  });

  it('should export cert.pfx with the fixed alias and password', async () => {
    await new KeyMaterialGenerator(ca).generate(certDir, 'dss_connector');

    const keystorePath = await new KeystorePackager(ca).package(certDir);

    expect(keystorePath).toBe(path.join(certDir, 'cert.pfx'));
    expect(ca.calls[2]).toEqual({
      op: 'exportPkcs12',
      options: {
        keyPath: path.join(certDir, 'key.pem'),
        certPath: path.join(certDir, 'cert.pem'),
        outPath: path.join(certDir, 'cert.pfx'),
        alias: 'datacellar',
        password: 'datacellar',
      },
    });
    expect(await fs.readFile(keystorePath)).toEqual(FAKE_KEYSTORE_BYTES);
  });

  it('should fail without writing a keystore when key.pem is missing', async () => {
    await fs.writeFile(path.join(certDir, 'cert.pem'), 'placeholder');

    const promise = new KeystorePackager(ca).package(certDir);

    await expect(promise).rejects.toBeInstanceOf(ProvisioningError);
    await expect(promise).rejects.toMatchObject({
      code: 'MISSING_ARTIFACT',
      message: `Error: Key material not found in ${certDir} (expected key.pem and cert.pem)`,
    });
    expect(ca.calls).toEqual([]);
    await expect(fs.access(path.join(certDir, 'cert.pfx'))).rejects.toThrow();
  });

  it('should fail when cert.pem is missing', async () => {
    await fs.writeFile(path.join(certDir, 'key.pem'), 'placeholder');

    await expect(new KeystorePackager(ca).package(certDir)).rejects.toMatchObject({
      code: 'MISSING_ARTIFACT',
    });
  });

  it('should reject a blank directory', async () => {
    await expect(new KeystorePackager(ca).package(' ')).rejects.toMatchObject({
      code: 'USAGE',
      message: 'Usage: certs package <cert_dir>',
    });
  });

  it('should propagate export failures', async () => {
    await new KeyMaterialGenerator(ca).generate(certDir, 'dss_connector');
    ca.failOn('exportPkcs12');

    await expect(new KeystorePackager(ca).package(certDir)).rejects.toMatchObject({
      code: 'TOOL_FAILURE',
    });
  });
});
