import { UpstreamServiceError } from './errors.js';
import { errorMessage, type Logger } from './log.js';

const RETRY_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const DEFAULT_MAX_ATTEMPTS = 3;

export interface UpstreamRequest {
  service: string;
  url: string;
  timeoutMs: number;
  init?: RequestInit;
  /** Non-idempotent calls such as sending mail should pass 1. */
  maxAttempts?: number;
  signal?: AbortSignal;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

export function buildUrl(baseUrl: string, path: string, params: Record<string, string> = {}): string {
  let url: URL;
  try {
    url = new URL(path, baseUrl);
  } catch (error) {
    throw new Error(`Failed to construct URL from base '${baseUrl}' and path '${path}': ${String(error)}`);
  }
  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}

/**
 * Performs an upstream request, retrying transient failures with exponential backoff.
 * Resolves with the successful response; the body is left for the caller to read.
 * Aborts from the caller's signal are rethrown as-is so they are not retried.
 */
export async function fetchWithRetries(request: UpstreamRequest, log: Logger): Promise<Response> {
  const { service, url, timeoutMs, init, signal: externalSignal } = request;
  const maxAttempts = request.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    const timeoutSignal = AbortSignal.timeout(timeoutMs);
    const signal = externalSignal ? AbortSignal.any([externalSignal, timeoutSignal]) : timeoutSignal;

    try {
      const response = await fetch(url, { ...init, signal });

      if (response.ok) {
        return response;
      }

      if (RETRY_STATUS_CODES.has(response.status) && attempt < maxAttempts) {
        const delay = 200 * 2 ** (attempt - 1);
        log.info('Retrying upstream request', { service, attempt, status: response.status, delay });
        await sleep(delay);
        continue;
      }

      const body = await response.text();
      throw new UpstreamServiceError(service, `Request failed with status ${response.status}: ${body}`);
    } catch (error) {
      if (externalSignal?.aborted) {
        throw externalSignal.reason instanceof Error
          ? externalSignal.reason
          : new Error(String(externalSignal.reason ?? 'Aborted'));
      }
      if (error instanceof UpstreamServiceError) {
        throw error;
      }
      lastError = error;
      if (attempt >= maxAttempts) {
        break;
      }
      const delay = 200 * 2 ** (attempt - 1);
      log.info('Retrying upstream request after error', {
        service,
        attempt,
        delay,
        error: errorMessage(error)
      });
      await sleep(delay);
    }
  }

  throw new UpstreamServiceError(service, `Failed to reach ${service}: ${errorMessage(lastError)}`, {
    cause: lastError
  });
}

export async function fetchJson(request: UpstreamRequest, log: Logger): Promise<unknown> {
  const response = await fetchWithRetries(request, log);
  try {
    return await response.json();
  } catch (error) {
    throw new UpstreamServiceError(request.service, 'Response was not valid JSON', { cause: error });
  }
}
