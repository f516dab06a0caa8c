/**
 * Minimal HTTP plumbing for the API clients
 *
 * Bodies are read as text first: the probe distinguishes an empty body
 * from a body it cannot parse.
 *
 * @license Apache-2.0
 */

import { ProbeError } from '../errors';

export interface HttpRequestInit {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
}

/** The part of a fetch Response the clients read */
export interface FetchResponse {
  status: number;
  ok: boolean;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init?: HttpRequestInit) => Promise<FetchResponse>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export interface HttpResult {
  url: string;
  status: number;
  ok: boolean;
  body: string;
}

/**
 * @throws ProbeError (TRANSPORT) if no response was received
 */
export async function sendRequest(
  fetchImpl: FetchLike,
  url: string,
  init?: HttpRequestInit
): Promise<HttpResult> {
  let response: FetchResponse;
  try {
    response = await fetchImpl(url, init);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ProbeError('TRANSPORT', `Request to ${url} failed: ${reason}`);
  }

  return {
    url,
    status: response.status,
    ok: response.ok,
    body: await response.text(),
  };
}

/**
 * @returns The parsed value, or undefined if the body is empty or not JSON
 */
export function parseJsonBody(body: string): unknown {
  if (body.trim() === '') {
    return undefined;
  }
  try {
    return JSON.parse(body);
  } catch (error) {
    return undefined;
  }
}

export function joinUrl(baseUrl: string, pathname: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${pathname}`;
}
