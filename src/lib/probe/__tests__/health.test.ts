/**
 * Tests for service health checks
 *
 * @license Apache-2.0
 */

import { describe, it, expect } from '@jest/globals';
import { checkServicesHealth, defaultHealthTargets } from '../health';
import { loadProbeConfig } from '../probe-config';
import { createFakeFetch } from '../../../test/fakes/fakeFetch';

describe('defaultHealthTargets', () => {
  it('should target both demo services', () => {
    expect(defaultHealthTargets(loadProbeConfig({}))).toEqual([
      { name: 'Dashboard API', url: 'http://localhost:38000/health' },
      { name: 'DSS Mock API', url: 'http://localhost:18000/health' },
    ]);
  });
});

describe('checkServicesHealth', () => {
  const targets = defaultHealthTargets(loadProbeConfig({}));

  it('should report healthy services', async () => {
    const fetchImpl = createFakeFetch({
      'GET http://localhost:38000/health': { body: '{"status":"healthy"}' },
      'GET http://localhost:18000/health': { body: '{"status":"healthy"}' },
    });

    const results = await checkServicesHealth(targets, fetchImpl);

    expect(results).toEqual([
      { name: 'Dashboard API', url: 'http://localhost:38000/health', ok: true, status: 200 },
      { name: 'DSS Mock API', url: 'http://localhost:18000/health', ok: true, status: 200 },
    ]);
  });

  it('should keep checking after a failure', async () => {
    const fetchImpl = createFakeFetch({
      'GET http://localhost:18000/health': { status: 503, body: '' },
    });

    const results = await checkServicesHealth(targets, fetchImpl);

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(results[0]).toEqual({
      name: 'Dashboard API',
      url: 'http://localhost:38000/health',
      ok: false,
      error:
        'Request to http://localhost:38000/health failed: ' +
        'fetch failed: connect ECONNREFUSED (GET http://localhost:38000/health)',
    });
    expect(results[1]).toMatchObject({ ok: false, status: 503 });
  });
});
