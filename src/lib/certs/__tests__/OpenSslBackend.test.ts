/**
 * Tests for OpenSslBackend
 *
 * The end-to-end cases need an openssl binary and skip without one.
 *
 * @license Apache-2.0
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from '@jest/globals';
import { execFile } from 'child_process';
import * as crypto from 'crypto';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { promisify } from 'util';
import { OpenSslBackend, escapeSubjectValue } from '../backends/OpenSslBackend';
import { provisionConnector } from '../provision';
import { KeyMaterialGenerator } from '../KeyMaterialGenerator';
import { inspectKeyMaterial } from '../inspect';
import { createRecordingReporter } from '../../../test/fakes/fakeFetch';

const MISSING_BIN = '/nonexistent/openssl-for-tests';

const execFileAsync = promisify(execFile);

describe('OpenSslBackend', () => {
  describe('getBackendType', () => {
    it('should return "openssl"', () => {
      expect(new OpenSslBackend().getBackendType()).toBe('openssl');
    });
  });

  describe('escapeSubjectValue', () => {
    it('should leave plain connector names untouched', () => {
      expect(escapeSubjectValue('dss_connector')).toBe('dss_connector');
    });

    it('should escape RDN separators', () => {
      expect(escapeSubjectValue('a/b+c\\d')).toBe('a\\/b\\+c\\\\d');
    });
  });

  describe('with a missing binary', () => {
    const backend = new OpenSslBackend({ opensslBin: MISSING_BIN });

    it('should report itself unavailable', async () => {
      expect(await backend.isAvailable()).toBe(false);
    });

    it('should fail operations with TOOL_FAILURE', async () => {
      await expect(backend.generatePrivateKey(path.join(os.tmpdir(), 'never.pem'))).rejects.toMatchObject({
        code: 'TOOL_FAILURE',
      });
    });

    it('should not leak the keystore password in error details', async () => {
      await expect(
        backend.exportPkcs12({
          keyPath: 'key.pem',
          certPath: 'cert.pem',
          outPath: 'cert.pfx',
          alias: 'datacellar',
          password: 'test-secret',
        })
      ).rejects.toMatchObject({
        details: { args: expect.arrayContaining(['pass:***']) },
      });
    });
  });

  describe('with a real openssl', () => {
    const backend = new OpenSslBackend();
    let available = false;
    let certDir: string;

    beforeAll(async () => {
      available = await backend.isAvailable();
      if (!available) {
        console.log('openssl not available - skipping integration tests');
      }
    });

    beforeEach(async () => {
      certDir = await fs.mkdtemp(path.join(os.tmpdir(), 'connector-kit-openssl-'));
    });

    afterEach(async () => {
      await fs.rm(certDir, { recursive: true, force: true });
    });

    it('should provision a matching key, certificate and keystore', async () => {
      if (!available) return;

      await provisionConnector(backend, {
        certDir,
        commonName: 'dss_connector',
        reporter: createRecordingReporter(),
      });
      const report = await inspectKeyMaterial(certDir);

      expect(report.commonName).toBe('dss_connector');
      expect(report.selfSigned).toBe(true);
      expect(report.keyMatches).toBe(true);
      expect(report.validityDays).toBe(365);
      expect((await fs.stat(path.join(certDir, 'cert.pfx'))).size).toBeGreaterThan(0);
    }, 30000);

    it.each(['connecteur_é', 'a+b', 'acme, dss', 'site/a'])(
      'should keep the common name %p exactly',
      async (commonName) => {
        if (!available) return;

        await new KeyMaterialGenerator(backend).generate(certDir, commonName);
        const report = await inspectKeyMaterial(certDir);

        expect(report.commonName).toBe(commonName);
        expect(report.keyMatches).toBe(true);
      },
      30000
    );

    it('should open the keystore with the fixed password and alias', async () => {
      if (!available) return;

      await provisionConnector(backend, {
        certDir,
        commonName: 'dss_connector',
        reporter: createRecordingReporter(),
      });
      const { stdout } = await execFileAsync('openssl', [
        'pkcs12',
        '-in', path.join(certDir, 'cert.pfx'),
        '-passin', 'pass:datacellar',
        '-nokeys',
        '-info',
      ]);

      expect(stdout).toContain('friendlyName: datacellar');
      expect(stdout).toContain('subject=CN');
    }, 30000);

    it('should detect a certificate paired with another key', async () => {
      if (!available) return;

      const keyPath = path.join(certDir, 'key.pem');
      await new KeyMaterialGenerator(backend).generate(certDir, 'dss_connector');
      await backend.generatePrivateKey(keyPath);
      const report = await inspectKeyMaterial(certDir);

      expect(report.keyMatches).toBe(false);
    }, 30000);

    it('should generate an RSA private key', async () => {
      if (!available) return;

      const keyPath = path.join(certDir, 'key.pem');
      await backend.generatePrivateKey(keyPath);
      const key = crypto.createPrivateKey(await fs.readFile(keyPath));

      expect(key.asymmetricKeyType).toBe('rsa');
    }, 30000);

    it('should report openssl stderr when signing without a key', async () => {
      if (!available) return;

      await expect(
        backend.selfSignCertificate({
          keyPath: path.join(certDir, 'missing-key.pem'),
          certPath: path.join(certDir, 'cert.pem'),
          commonName: 'dss_connector',
          validityDays: 365,
        })
      ).rejects.toMatchObject({ code: 'TOOL_FAILURE' });
    }, 30000);
  });
});
