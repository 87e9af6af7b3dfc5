import { STATUS_CODES } from 'node:http';
import { request, type Dispatcher } from 'undici';

import { createFetchError, type HarvestError } from '../../errors.js';
import { getLogger } from '../../logger.js';
import type { SkipCategory, Target } from '../../types.js';
import { classifyFetchError, extractErrorCode } from './classifyFetchError.js';
import type { HttpClient } from './httpClient.js';

export interface FetchSuccess {
  ok: true;
  url: string;
  status: number;
  body: AsyncIterable<Uint8Array>;
  /** Stops the request timer and frees the connection. Safe to call more than once. */
  release(): void;
}

export interface FetchSkip {
  ok: false;
  url: string;
  status: number | null;
  category: SkipCategory;
  reason: string;
  error?: HarvestError;
}

export type FetchOutcome = FetchSuccess | FetchSkip;

const OK_STATUS = 200;

export async function fetchTarget(target: Target, client: HttpClient): Promise<FetchOutcome> {
  const controller = new AbortController();
  let timedOut = false;
  const timeoutId = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, client.requestTimeoutMs);

  let response: Dispatcher.ResponseData;
  try {
    response = await request(target.url, {
      dispatcher: client.dispatcher,
      method: 'GET',
      headers: { ...client.headers },
      signal: controller.signal,
      maxRedirections: client.maxRedirections,
    });
  } catch (error) {
    clearTimeout(timeoutId);
    return describeTransportFailure(target, error, timedOut, client.requestTimeoutMs);
  }

  const { statusCode, body } = response;
  let released = false;
  const release = (): void => {
    if (released) {
      return;
    }
    released = true;
    clearTimeout(timeoutId);
    if (!body.destroyed) {
      // Destroying an unread undici body emits an abort error on the stream.
      body.on('error', (error: unknown) => {
        getLogger().debug({ target: target.url, err: error }, 'response body discarded');
      });
      body.destroy();
    }
  };

  getLogger().debug({ target: target.url, status: statusCode }, 'response received');

  if (statusCode !== OK_STATUS) {
    await discardBody(target, body);
    release();
    return {
      ok: false,
      url: target.url,
      status: statusCode,
      category: 'http-status',
      reason: formatStatus(statusCode),
    };
  }

  return {
    ok: true,
    url: target.url,
    status: statusCode,
    body,
    release,
  };
}

async function discardBody(target: Target, body: Dispatcher.ResponseData['body']): Promise<void> {
  try {
    await body.dump();
  } catch (error) {
    getLogger().debug({ target: target.url, err: error }, 'failed to drain error response body');
  }
}

function describeTransportFailure(
  target: Target,
  error: unknown,
  timedOut: boolean,
  timeoutMs: number,
): FetchSkip {
  const category = timedOut ? 'timeout' : classifyFetchError(error);
  const code = extractErrorCode(error);
  const message = timedOut
    ? `Request timed out after ${timeoutMs}ms`
    : error instanceof Error && error.message
      ? error.message
      : 'Request failed';

  return {
    ok: false,
    url: target.url,
    status: null,
    category,
    reason: message,
    error: createFetchError(
      message,
      category,
      {
        target: target.url,
        ...(code ? { code } : {}),
      },
      { cause: error },
    ),
  };
}

export function formatStatus(status: number): string {
  const text = STATUS_CODES[status];
  return text ? `HTTP ${status} ${text}` : `HTTP ${status}`;
}
