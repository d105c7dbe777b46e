import axios, { type AxiosInstance, type CreateAxiosDefaults } from "axios";
import type { HttpRequest, HttpResponse, HttpTransport } from "@/types";
import { API_TIMEOUTS } from "@/utils/constants";
import { TransportError } from "./errors";

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

export const createHttpClient = (config?: CreateAxiosDefaults): AxiosInstance =>
  axios.create({
    headers: {
      "Content-Type": "application/json",
      Accept: "application/json",
    },
    timeout: API_TIMEOUTS.DEFAULT,
    // Status handling belongs to the session; every response is resolved.
    validateStatus: () => true,
    ...config,
  });

const toTransportError = (error: unknown, request: HttpRequest): TransportError => {
  if (axios.isAxiosError(error)) {
    const timedOut = error.code !== undefined && TIMEOUT_CODES.has(error.code);
    const reason = timedOut ? `timed out after ${request.timeoutMs}ms` : error.message;
    return new TransportError(`${request.method} ${request.url} failed: ${reason}`, {
      timedOut,
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`${request.method} ${request.url} failed: ${message}`, {
    cause: error,
  });
};

export class AxiosTransport implements HttpTransport {
  constructor(private readonly client: AxiosInstance = createHttpClient()) {}

  async request(request: HttpRequest): Promise<HttpResponse> {
    try {
      const response = await this.client.request<unknown>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        params: request.params,
        data: request.body,
        timeout: request.timeoutMs,
      });

      return { status: response.status, data: response.data };
    } catch (error) {
      throw toTransportError(error, request);
    }
  }
}

export const createAxiosTransport = (config?: CreateAxiosDefaults): HttpTransport =>
  new AxiosTransport(createHttpClient(config));
