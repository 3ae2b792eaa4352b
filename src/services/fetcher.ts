import type { FetchedPage } from "../types.js";
import { config } from "../config.js";
import { FetchFailureError, isTransientStatus } from "../errors.js";
import { logger } from "../logger.js";
import { isBlockedUrl } from "./url.js";
import { NO_RETRY, withRetry, type RetryPolicy } from "./retry.js";

const {
  requestTimeoutMs: REQUEST_TIMEOUT_MS,
  maxRedirects: MAX_REDIRECTS,
  maxResponseSizeBytes: MAX_RESPONSE_SIZE_BYTES,
  userAgent: USER_AGENT,
} = config.crawler;

const log = logger.child("fetcher");

export interface PageFetcher {
  /** Fetch one HTML page; throws `FetchFailureError` on any failure. */
  fetch(url: string, signal?: AbortSignal): Promise<FetchedPage>;
}

export type HttpPageFetcherOptions = {
  timeoutMs?: number;
  maxRedirects?: number;
  maxResponseSizeBytes?: number;
  userAgent?: string;
  retry?: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
};

export class HttpPageFetcher implements PageFetcher {
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;
  private readonly maxResponseSizeBytes: number;
  private readonly userAgent: string;
  private readonly retry: RetryPolicy;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(options: HttpPageFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.maxRedirects = options.maxRedirects ?? MAX_REDIRECTS;
    this.maxResponseSizeBytes = options.maxResponseSizeBytes ?? MAX_RESPONSE_SIZE_BYTES;
    this.userAgent = options.userAgent ?? USER_AGENT;
    this.retry = options.retry ?? NO_RETRY;
    this.sleep = options.sleep;
  }

  fetch(url: string, signal?: AbortSignal): Promise<FetchedPage> {
    return withRetry(() => this.fetchOnce(url, signal), {
      policy: this.retry,
      label: `GET ${url}`,
      sleep: this.sleep,
      signal,
    });
  }

  private async fetchOnce(url: string, signal?: AbortSignal): Promise<FetchedPage> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      let currentUrl = url;
      for (let hop = 0; hop <= this.maxRedirects; hop++) {
        const response = await this.request(currentUrl, controller.signal);

        if (response.status >= 300 && response.status < 400) {
          const location = response.headers.get("location");
          if (!location) {
            throw new FetchFailureError(currentUrl, `Redirect without location (HTTP ${response.status})`, {
              status: response.status,
              transient: false,
            });
          }

          let redirectUrl: string;
          try {
            redirectUrl = new URL(location, currentUrl).href;
          } catch {
            throw new FetchFailureError(currentUrl, `Invalid redirect location "${location}"`, {
              status: response.status,
              transient: false,
            });
          }
          // SSRF check on redirect URL
          if (isBlockedUrl(redirectUrl)) {
            log.warn("Blocked redirect to internal URL", { from: currentUrl, to: redirectUrl });
            throw new FetchFailureError(currentUrl, `Redirect to blocked URL ${redirectUrl}`, { transient: false });
          }
          currentUrl = redirectUrl;
          continue;
        }

        if (!response.ok) {
          throw new FetchFailureError(currentUrl, `HTTP ${response.status} from ${currentUrl}`, {
            status: response.status,
            transient: isTransientStatus(response.status),
          });
        }

        const contentType = response.headers.get("content-type") ?? "";
        if (!contentType.includes("text/html") && !contentType.includes("application/xhtml+xml")) {
          throw new FetchFailureError(currentUrl, `Unsupported content type "${contentType}"`, {
            status: response.status,
            transient: false,
          });
        }

        const contentLength = response.headers.get("content-length");
        if (contentLength && parseInt(contentLength, 10) > this.maxResponseSizeBytes) {
          throw new FetchFailureError(currentUrl, `Response too large (${contentLength} bytes)`, {
            status: response.status,
            transient: false,
          });
        }

        const html = await this.readResponseWithLimit(response, currentUrl);
        return { url: currentUrl, status: response.status, html };
      }

      throw new FetchFailureError(url, `Too many redirects (>${this.maxRedirects})`, { transient: false });
    } catch (error) {
      if (error instanceof FetchFailureError) {
        throw error;
      }
      const timedOut = controller.signal.aborted && !signal?.aborted;
      const message = timedOut
        ? `Timed out after ${this.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new FetchFailureError(url, `Failed to fetch ${url}: ${message}`, { transient: true, cause: error });
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }

  private request(url: string, signal: AbortSignal): Promise<Response> {
    return fetch(url, {
      signal,
      redirect: "manual",
      headers: {
        "User-Agent": this.userAgent,
        Accept: "text/html,application/xhtml+xml",
      },
    });
  }

  /**
   * Read response body with size limit using streaming
   */
  private async readResponseWithLimit(response: Response, url: string): Promise<string> {
    const reader = response.body?.getReader();
    if (!reader) {
      return "";
    }

    const decoder = new TextDecoder();
    let html = "";
    let totalSize = 0;

    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }

      totalSize += value.byteLength;
      if (totalSize > this.maxResponseSizeBytes) {
        await reader.cancel();
        throw new FetchFailureError(url, `Response exceeded ${this.maxResponseSizeBytes} bytes`, {
          status: response.status,
          transient: false,
        });
      }

      html += decoder.decode(value, { stream: true });
    }

    return html + decoder.decode();
  }
}
