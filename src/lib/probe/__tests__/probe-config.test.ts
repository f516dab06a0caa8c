/**
 * Tests for probe configuration
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from '@jest/globals';
import {
  PROBE_PROFILES,
  dashboardBaseUrl,
  dssBaseUrl,
  loadProbeConfig,
  parseProbeProfile,
} from '../probe-config';
import { ConfigError } from '../../errors';

describe('loadProbeConfig', () => {
  it('should use the demo defaults with an empty environment', () => {
    expect(loadProbeConfig({})).toEqual({
      host: 'localhost',
      dashboardApiPort: 38000,
      dssApiPort: 18000,
      waitSeconds: 30,
      buildingId: 'building_001',
      optimizationType: 'energy_efficiency',
      userId: 'test-user-001',
      dssApiKey: 'dss-backend-key',
      profile: PROBE_PROFILES.lenient,
    });
  });

  it('should read values from the environment', () => {
    const config = loadProbeConfig({
      PROBE_HOST: '10.0.0.5',
      DASHBOARD_API_PORT: '8080',
      DSS_API_PORT: '8081',
      WAIT_TIME_SECONDS: '5',
      BUILDING_ID: 'building_042',
      OPTIMIZATION_TYPE: 'peak_shaving',
      USER_ID: 'operator-7',
      DSS_API_KEY: 'test-secret',
      PROBE_PROFILE: 'strict',
    });

    expect(config).toMatchObject({
      host: '10.0.0.5',
      dashboardApiPort: 8080,
      dssApiPort: 8081,
      waitSeconds: 5,
      buildingId: 'building_042',
      optimizationType: 'peak_shaving',
      userId: 'operator-7',
      dssApiKey: 'test-secret',
    });
    expect(config.profile.name).toBe('strict');
    expect(dashboardBaseUrl(config)).toBe('http://10.0.0.5:8080');
    expect(dssBaseUrl(config)).toBe('http://10.0.0.5:8081');
  });

  it('should let overrides win over the environment', () => {
    const config = loadProbeConfig(
      { PROBE_PROFILE: 'strict', WAIT_TIME_SECONDS: '5', PROBE_HOST: 'env-host' },
      { profile: 'lenient', waitSeconds: 0, host: 'flag-host' }
    );

    expect(config.profile.name).toBe('lenient');
    expect(config.waitSeconds).toBe(0);
    expect(config.host).toBe('flag-host');
  });

  it('should treat empty variables as unset', () => {
    const config = loadProbeConfig({ WAIT_TIME_SECONDS: '', DSS_API_KEY: '', PROBE_PROFILE: '' });

    expect(config.waitSeconds).toBe(30);
    expect(config.dssApiKey).toBe('dss-backend-key');
    expect(config.profile.name).toBe('lenient');
  });

  it('should reject a non-numeric wait time', () => {
    expect(() => loadProbeConfig({ WAIT_TIME_SECONDS: 'soon' })).toThrow(
      'WAIT_TIME_SECONDS must be a non-negative integer, got "soon"'
    );
  });

  it('should reject negative ports', () => {
    expect(() => loadProbeConfig({ DSS_API_PORT: '-1' })).toThrow(ConfigError);
  });

  it('should reject ports above 65535', () => {
    expect(() => loadProbeConfig({ DASHBOARD_API_PORT: '65536' })).toThrow(
      'DASHBOARD_API_PORT must be at most 65535, got "65536"'
    );
    expect(loadProbeConfig({ DSS_API_PORT: '65535' }).dssApiPort).toBe(65535);
  });

  it('should reject a wait time longer than a timer can hold', () => {
    expect(() => loadProbeConfig({ WAIT_TIME_SECONDS: '2147484' })).toThrow(
      'WAIT_TIME_SECONDS must be at most 2147483, got "2147484"'
    );
    expect(loadProbeConfig({ WAIT_TIME_SECONDS: '2147483' }).waitSeconds).toBe(2147483);
  });

  it('should bound the wait time given as an override', () => {
    expect(() => loadProbeConfig({}, { waitSeconds: 2147484 })).toThrow(ConfigError);
  });
});

describe('parseProbeProfile', () => {
  it('should default to lenient', () => {
    expect(parseProbeProfile(undefined)).toBe(PROBE_PROFILES.lenient);
  });

  it('should only fail on incomplete hand-off under strict', () => {
    expect(parseProbeProfile('lenient').failOnIncompleteHandoff).toBe(false);
    expect(parseProbeProfile('strict').failOnIncompleteHandoff).toBe(true);
  });

  it('should reject unknown profiles', () => {
    expect(() => parseProbeProfile('paranoid')).toThrow(
      'Unknown probe profile: "paranoid". Supported profiles: lenient, strict'
    );
  });
});
