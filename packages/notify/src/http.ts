export interface HttpResponse {
  status: number;
  ok: boolean;
  body: string;
}

export interface HttpRequest {
  method: string;
  headers: Record<string, string>;
  body: string;
  timeoutMs: number;
}

/**
 * Single fetch bounded by an AbortController deadline
 */
export async function sendRequest(url: string, request: HttpRequest): Promise<HttpResponse> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs);

  try {
    const response = await fetch(url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: controller.signal,
    });
    return { status: response.status, ok: response.ok, body: await response.text() };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Readable failure text for a fetch rejection
 */
export function requestFailure(error: unknown): string {
  if (error instanceof Error) {
    return error.name === 'AbortError' ? 'Request timed out' : error.message;
  }
  return String(error);
}

export function httpFailure(response: HttpResponse): string {
  const detail = response.body.slice(0, 200);
  return detail ? `HTTP ${response.status}: ${detail}` : `HTTP ${response.status}`;
}
