/**
 * Probe configuration
 *
 * Two profiles exist and one is always chosen explicitly:
 * - `lenient`: a missing DSS hand-off is reported as a warning
 * - `strict`: a missing DSS hand-off fails the run
 *
 * @license Apache-2.0
 */

import {
  DSS_BACKEND_KEY,
  MAX_PORT,
  MAX_WAIT_SECONDS,
  assertAtMost,
  readIntEnv,
  readStringEnv,
  type Env,
} from '../config';
import { ConfigError } from '../errors';

export type ProbeProfileName = 'lenient' | 'strict';

export interface ProbeProfile {
  name: ProbeProfileName;
  failOnIncompleteHandoff: boolean;
  defaultDssApiKey: string;
}

export const PROBE_PROFILES: Record<ProbeProfileName, ProbeProfile> = {
  lenient: { name: 'lenient', failOnIncompleteHandoff: false, defaultDssApiKey: DSS_BACKEND_KEY },
  strict: { name: 'strict', failOnIncompleteHandoff: true, defaultDssApiKey: DSS_BACKEND_KEY },
};

export interface ProbeConfig {
  host: string;
  dashboardApiPort: number;
  dssApiPort: number;
  waitSeconds: number;
  buildingId: string;
  optimizationType: string;
  userId: string;
  dssApiKey: string;
  profile: ProbeProfile;
}

export interface ProbeOverrides {
  profile?: string;
  waitSeconds?: number;
  host?: string;
}

export function parseProbeProfile(value: string | undefined): ProbeProfile {
  const name = value === undefined || value === '' ? 'lenient' : value;
  if (name !== 'lenient' && name !== 'strict') {
    throw new ConfigError('PROBE_PROFILE', `Unknown probe profile: "${name}". Supported profiles: lenient, strict`);
  }
  return PROBE_PROFILES[name];
}

/**
 * Build the probe configuration; overrides (CLI flags) win over the environment.
 *
 * @throws ConfigError if a port or the wait time is not a non-negative integer
 *   or is above its maximum
 */
export function loadProbeConfig(env: Env = process.env, overrides: ProbeOverrides = {}): ProbeConfig {
  const profile = parseProbeProfile(overrides.profile ?? env.PROBE_PROFILE);

  return {
    host: overrides.host ?? readStringEnv(env, 'PROBE_HOST', 'localhost'),
    dashboardApiPort: readIntEnv(env, 'DASHBOARD_API_PORT', 38000, MAX_PORT),
    dssApiPort: readIntEnv(env, 'DSS_API_PORT', 18000, MAX_PORT),
    waitSeconds:
      overrides.waitSeconds === undefined
        ? readIntEnv(env, 'WAIT_TIME_SECONDS', 30, MAX_WAIT_SECONDS)
        : assertAtMost(overrides.waitSeconds, 'waitSeconds', MAX_WAIT_SECONDS),
    buildingId: readStringEnv(env, 'BUILDING_ID', 'building_001'),
    optimizationType: readStringEnv(env, 'OPTIMIZATION_TYPE', 'energy_efficiency'),
    userId: readStringEnv(env, 'USER_ID', 'test-user-001'),
    dssApiKey: readStringEnv(env, 'DSS_API_KEY', profile.defaultDssApiKey),
    profile,
  };
}

export function dashboardBaseUrl(config: ProbeConfig): string {
  return `http://${config.host}:${config.dashboardApiPort}`;
}

export function dssBaseUrl(config: ProbeConfig): string {
  return `http://${config.host}:${config.dssApiPort}`;
}
