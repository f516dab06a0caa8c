/**
 * Service health checks
 *
 * Every service is checked, even after a failure, so one run reports the
 * state of the whole demo.
 *
 * @license Apache-2.0
 */

import { defaultFetch, joinUrl, sendRequest, type FetchLike } from './http';
import { dashboardBaseUrl, dssBaseUrl, type ProbeConfig } from './probe-config';
import { errorMessage } from '../errors';

export interface HealthTarget {
  name: string;
  url: string;
}

export interface HealthResult extends HealthTarget {
  ok: boolean;
  status?: number;
  error?: string;
}

export function defaultHealthTargets(config: ProbeConfig): HealthTarget[] {
  return [
    { name: 'Dashboard API', url: joinUrl(dashboardBaseUrl(config), '/health') },
    { name: 'DSS Mock API', url: joinUrl(dssBaseUrl(config), '/health') },
  ];
}

export async function checkServicesHealth(
  targets: HealthTarget[],
  fetchImpl: FetchLike = defaultFetch
): Promise<HealthResult[]> {
  const results: HealthResult[] = [];

  for (const target of targets) {
    try {
      const response = await sendRequest(fetchImpl, target.url);
      results.push({ ...target, ok: response.ok, status: response.status });
    } catch (error) {
      results.push({ ...target, ok: false, error: errorMessage(error) });
    }
  }

  return results;
}
