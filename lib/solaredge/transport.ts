import { SOLAREDGE_API_CONFIG } from "../../config";

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * What the client needs from HTTP: a GET that resolves with status and body
 * for every status code, and rejects only when no response arrived.
 */
export interface HttpTransport {
  get(url: string): Promise<HttpResponse>;
}

export interface FetchTransportOptions {
  /** Abort the request after this many milliseconds */
  timeoutMs?: number;
  headers?: Record<string, string>;
}

/**
 * HttpTransport backed by the global fetch of Node.js
 */
export class FetchTransport implements HttpTransport {
  private timeoutMs: number;
  private headers: Record<string, string>;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? SOLAREDGE_API_CONFIG.timeout;
    this.headers = {
      Accept: "application/json",
      ...options.headers,
    };
  }

  async get(url: string): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: this.headers,
        signal: controller.signal,
      });

      return {
        status: response.status,
        body: await response.text(),
      };
    } finally {
      clearTimeout(timeout);
    }
  }
}
