const DEFAULT_TIMEOUT_MS = 20_000;

export interface RequestJsonInit extends Omit<RequestInit, 'signal'> {
  timeoutMs?: number;
}

export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, statusText: string, body: string) {
    const trimmed = body.trim();
    const bodyPreview = trimmed.length > 0 ? trimmed.slice(0, 400) : '<empty>';
    super(`HTTP ${status} ${statusText}: ${bodyPreview}`);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

/**
 * Single JSON request with a hard timeout. Callers own retry policy; none happens here.
 */
export async function requestJson(input: string | URL, init: RequestJsonInit = {}): Promise<unknown> {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, ...fetchInit } = init;
  const response = await fetch(input, {
    ...fetchInit,
    signal: AbortSignal.timeout(timeoutMs),
    headers: {
      Accept: 'application/json',
      ...(fetchInit.headers ?? {})
    }
  });

  const text = await response.text();
  if (!response.ok) {
    throw new HttpStatusError(response.status, response.statusText, text);
  }

  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Response is not valid JSON: ${text.slice(0, 300)}`);
  }
}
