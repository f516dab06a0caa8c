/**
 * Dashboard API client
 *
 * The Dashboard backend orchestrates tool access: `POST /f1/request-tool`
 * starts a contract negotiation and transfer between the two connectors in
 * the background, and `GET /f1/requests/{id}` reports how far it got.
 *
 * @license Apache-2.0
 */

import { defaultFetch, joinUrl, parseJsonBody, sendRequest, type FetchLike, type HttpResult } from './http';
import { describeErrors, isRequestList } from './schemas';
import type { RequestRecord, ToolRequest } from './types';
import { ProbeError } from '../errors';

export class DashboardApiClient {
  constructor(
    private baseUrl: string,
    private fetchImpl: FetchLike = defaultFetch
  ) {}

  async requestTool(request: ToolRequest): Promise<HttpResult> {
    return sendRequest(this.fetchImpl, joinUrl(this.baseUrl, '/f1/request-tool'), {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(request),
    });
  }

  async getRequest(requestId: string): Promise<HttpResult> {
    return sendRequest(
      this.fetchImpl,
      joinUrl(this.baseUrl, `/f1/requests/${encodeURIComponent(requestId)}`)
    );
  }

  /**
   * @throws ProbeError if the service answers with something other than a request list
   */
  async listRequests(): Promise<RequestRecord[]> {
    const result = await sendRequest(this.fetchImpl, joinUrl(this.baseUrl, '/f1/requests'));
    if (!result.ok) {
      throw new ProbeError('MALFORMED_RESPONSE', `Listing requests failed: HTTP ${result.status}`, result.body);
    }

    const payload = parseJsonBody(result.body);
    if (!isRequestList(payload)) {
      throw new ProbeError(
        'MALFORMED_RESPONSE',
        `Unexpected request list: ${describeErrors(isRequestList)}`,
        result.body
      );
    }
    return payload.requests;
  }
}
