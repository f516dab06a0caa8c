/**
 * DSS API client
 *
 * Job endpoints of the DSS mock service. Every call carries the static
 * `X-API-Key` header the service checks.
 *
 * @license Apache-2.0
 */

import { defaultFetch, joinUrl, parseJsonBody, sendRequest, type FetchLike, type HttpResult } from './http';
import { describeErrors, isJobList } from './schemas';
import type { JobStatus } from './types';
import { ProbeError } from '../errors';

export const API_KEY_HEADER = 'X-API-Key';

export class DssApiClient {
  constructor(
    private baseUrl: string,
    private apiKey: string,
    private fetchImpl: FetchLike = defaultFetch
  ) {}

  async getJob(jobId: string): Promise<HttpResult> {
    return sendRequest(
      this.fetchImpl,
      joinUrl(this.baseUrl, `/f1/jobs/${encodeURIComponent(jobId)}`),
      { headers: this.authHeaders() }
    );
  }

  /**
   * @throws ProbeError if the service answers with something other than a job list
   */
  async listJobs(): Promise<JobStatus[]> {
    const result = await sendRequest(this.fetchImpl, joinUrl(this.baseUrl, '/f1/jobs'), {
      headers: this.authHeaders(),
    });
    if (!result.ok) {
      throw new ProbeError('MALFORMED_RESPONSE', `Listing jobs failed: HTTP ${result.status}`, result.body);
    }

    const payload = parseJsonBody(result.body);
    if (!isJobList(payload)) {
      throw new ProbeError(
        'MALFORMED_RESPONSE',
        `Unexpected job list: ${describeErrors(isJobList)}`,
        result.body
      );
    }
    return payload.jobs;
  }

  private authHeaders(): Record<string, string> {
    return { [API_KEY_HEADER]: this.apiKey };
  }
}
