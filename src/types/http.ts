export type HttpMethod = "GET" | "POST";

export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers?: Record<string, string>;
  params?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  data: unknown;
}

/**
 * Issues one HTTP request and resolves with whatever status the server sent.
 * Rejects only when no response was received (network failure, timeout).
 */
export interface HttpTransport {
  request(request: HttpRequest): Promise<HttpResponse>;
}
