import type { CatalogPage, MusicCatalogClient } from "../../ports/MusicCatalogClient";
import type { TokenProvider } from "../../ports/TokenProvider";
import type { RawRecord } from "../../core/ingestion/batch";
import type { ExtractionWindow } from "../../core/ingestion/window";
import {
  AuthError,
  isIngestionError,
  RateLimitError,
  SourceApiError,
  TransientNetworkError
} from "../../core/ingestion/errors";
import { decideRetry, retryKindOf, retryRuleFor } from "../../core/ingestion/retry-policy";
import { retry } from "../../shared/retry/retry";

export type MusicCatalogHttpClientOptions = {
  timeoutMs: number;
  pageSize: number;
  maxPages: number;
  retries: number;
  minDelayMs: number;
  maxDelayMs: number;
  maxRetryAfterMs: number; // a longer Retry-After gives up with the RateLimitError
};

export const defaultCatalogClientOptions: MusicCatalogHttpClientOptions = {
  timeoutMs: 8000,
  pageSize: 50,
  maxPages: 1000,
  retries: 5,
  minDelayMs: 250,
  maxDelayMs: 5000,
  maxRetryAfterMs: 60000
};

const isRecord = (value: unknown): value is RawRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseRetryAfterMs = (header: string | null): number | undefined => {
  if (!header || !/^\d+$/.test(header)) return undefined;
  const ms = Number(header) * 1000;
  return Number.isSafeInteger(ms) ? ms : undefined;
};

const safeUrl = (url: URL) => `${url.origin}${url.pathname}${url.search}`;

/**
 * Paged reader for a Spotify-style catalog API: `{ items, next }` bodies,
 * time-bounded with `after`/`before` epoch milliseconds.
 */
export class MusicCatalogHttpClient implements MusicCatalogClient {
  private readonly options: MusicCatalogHttpClientOptions;
  private readonly origin: string;

  constructor(
    private readonly baseUrl: string,
    private readonly tokens: TokenProvider,
    options: Partial<MusicCatalogHttpClientOptions> = {}
  ) {
    this.options = { ...defaultCatalogClientOptions, ...options };
    this.origin = new URL(baseUrl).origin;
  }

  async *pages(entity: string, window: ExtractionWindow): AsyncGenerator<RawRecord[]> {
    let cursor: string | undefined;
    let fetched = 0;

    do {
      if (fetched >= this.options.maxPages) {
        throw new SourceApiError(
          `Window ${window.start.toISOString()}..${window.end.toISOString()} needs more than ${this.options.maxPages} pages`,
          { code: "pagination_limit" }
        );
      }
      const page = await this.fetchPage(entity, window, cursor);
      fetched += 1;
      yield page.records;
      cursor = page.nextCursor;
    } while (cursor);
  }

  async fetchPage(entity: string, window: ExtractionWindow, cursor?: string): Promise<CatalogPage> {
    const url = cursor ? this.resolveCursor(cursor) : this.firstPageUrl(entity, window);
    const requestUrl = safeUrl(url);

    return retry(() => this.request(url), {
      retries: this.options.retries,
      minDelayMs: this.options.minDelayMs,
      maxDelayMs: this.options.maxDelayMs,
      maxCustomDelayMs: this.options.maxRetryAfterMs,
      shouldRetry: decideRetry,
      kindOf: retryKindOf,
      onRetry: ({ attempt, maxAttempts, error }) => {
        if (retryRuleFor(error).refreshCredentials) {
          this.tokens.invalidate();
        }
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "http.retry",
          kind: isIngestionError(error) ? error.kind : "Unknown",
          status: isIngestionError(error) ? error.status ?? null : null,
          url: requestUrl,
          attempt,
          maxAttempts
        }));
      },
      onGiveUp: ({ attempt, maxAttempts, error }) => {
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({
          event: "http.give_up",
          kind: isIngestionError(error) ? error.kind : "Unknown",
          status: isIngestionError(error) ? error.status ?? null : null,
          url: requestUrl,
          attempt,
          maxAttempts
        }));
      }
    });
  }

  private firstPageUrl(entity: string, window: ExtractionWindow): URL {
    const url = new URL(this.baseUrl);
    url.pathname = url.pathname.endsWith("/") ? `${url.pathname}${entity}` : `${url.pathname}/${entity}`;
    url.searchParams.set("after", String(window.start.getTime()));
    url.searchParams.set("before", String(window.end.getTime()));
    url.searchParams.set("limit", String(this.options.pageSize));
    return url;
  }

  private resolveCursor(cursor: string): URL {
    let url: URL;
    try {
      url = new URL(cursor, this.baseUrl);
    } catch {
      throw new SourceApiError("Pagination cursor is not a valid URL", { code: "invalid_cursor" });
    }
    // the bearer token must never be sent to another host
    if (url.origin !== this.origin) {
      throw new SourceApiError(`Pagination cursor points outside ${this.origin}`, { code: "foreign_cursor" });
    }
    return url;
  }

  private async request(url: URL): Promise<CatalogPage> {
    const requestUrl = safeUrl(url);
    const token = await this.tokens.getToken();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let res: Response;
    try {
      res = await fetch(url.toString(), {
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: "application/json"
        },
        signal: controller.signal
      });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new TransientNetworkError(`Catalog request timeout after ${this.options.timeoutMs}ms`, {
          isTimeout: true,
          requestUrl
        });
      }
      throw new TransientNetworkError("Catalog request failed", { requestUrl, cause: err });
    } finally {
      clearTimeout(timeout);
    }

    if (!res.ok) {
      await res.text().catch(() => "");
      const status = res.status;
      const message = `Catalog request failed: ${status}`;
      if (status === 401) throw new AuthError(message, { status, requestUrl });
      if (status === 429) {
        throw new RateLimitError(message, {
          status,
          requestUrl,
          retryAfterMs: parseRetryAfterMs(res.headers.get("retry-after"))
        });
      }
      if (status >= 500) throw new TransientNetworkError(message, { status, requestUrl });
      throw new SourceApiError(message, { status, requestUrl });
    }

    const body: unknown = await res.json().catch(() => undefined);
    return this.parsePage(body, requestUrl);
  }

  private parsePage(body: unknown, requestUrl: string): CatalogPage {
    if (!isRecord(body) || !Array.isArray(body.items)) {
      throw new SourceApiError("Catalog response has no items array", { code: "invalid_response", requestUrl });
    }

    const records: RawRecord[] = [];
    for (const item of body.items) {
      if (!isRecord(item)) {
        throw new SourceApiError("Catalog response contains a non-object item", {
          code: "invalid_response",
          requestUrl
        });
      }
      records.push(item);
    }

    const next = body.next;
    if (next != null && typeof next !== "string") {
      throw new SourceApiError("Catalog response has a non-string next cursor", {
        code: "invalid_response",
        requestUrl
      });
    }

    return { records, nextCursor: next ? next : undefined };
  }
}
