import { fetch as undiciFetch, type RequestInit, type Response } from 'undici';
import { TranscriptionError } from './errors';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export const defaultFetch: FetchFn = (url, init) => undiciFetch(url, init);

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || /aborted|AbortError/i.test(err.message));
}

/**
 * Runs a request with a hard timeout. Transport failures (DNS, reset, abort)
 * become `network_error`; HTTP statuses are left to the caller.
 */
export async function fetchWithTimeout(
  fetchFn: FetchFn,
  url: string,
  init: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetchFn(url, { ...init, signal: controller.signal });
  } catch (error) {
    if (isAbortError(error)) {
      throw new TranscriptionError('network_error', `Request timed out after ${timeoutMs}ms`, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new TranscriptionError('network_error', message, { cause: error });
  } finally {
    clearTimeout(timer);
  }
}

export async function safeReadText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (e) {
    return `<<failed to read response body: ${String(e)}>>`;
  }
}

export function truncateForLog(value: string, max = 500): string {
  if (value.length <= max) return value;
  return `${value.slice(0, max)}…(truncated)`;
}
