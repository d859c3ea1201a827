/**
 * fetch wrapper with an abort-based timeout that reports HTTP failures as
 * data. Timeouts and network errors come back with `status: null`.
 */

export interface HttpResult {
  ok: boolean;
  status: number | null;
  body: string;
  elapsedMs: number;
  error?: string;
}

export async function requestWithTimeout(
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<HttpResult> {
  const startedAt = Date.now();
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    const body = await response.text();
    const elapsedMs = Date.now() - startedAt;

    if (!response.ok) {
      return { ok: false, status: response.status, body, elapsedMs, error: `HTTP ${response.status}: ${body}` };
    }
    return { ok: true, status: response.status, body, elapsedMs };
  } catch (error) {
    const elapsedMs = Date.now() - startedAt;
    if (error instanceof Error && error.name === 'AbortError') {
      return { ok: false, status: null, body: '', elapsedMs, error: `Request timeout after ${timeoutMs}ms` };
    }
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, status: null, body: '', elapsedMs, error: `Request error: ${message}` };
  } finally {
    clearTimeout(timeoutId);
  }
}

/** Timeouts, network errors, 429 and 5xx. */
export function isTransientFailure(result: Pick<HttpResult, 'ok' | 'status'>): boolean {
  if (result.ok) return false;
  return result.status === null || result.status === 429 || result.status >= 500;
}

export function parseJson(body: string): unknown {
  if (!body) return null;
  try {
    return JSON.parse(body);
  } catch {
    return null;
  }
}
