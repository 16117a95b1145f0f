import http from "http";
import { URL } from "url";

/**
 * Minimal fake music-catalog API for local runs and tests.
 * - POST /api/token            client-credentials token endpoint
 * - GET  /v1/<entity>?after=&before=&limit=&offset=
 *   Returns `{ items, next }` pages of deterministic play records, one per
 *   minute from `epoch`, filtered to `[after, before)`.
 */
export type FakeCatalogOptions = {
  total: number;
  epoch: Date;
  token: string;
  rateLimitedResponses?: number;
  retryAfterSeconds?: number;
};

export const defaultFakeCatalogOptions: FakeCatalogOptions = {
  total: 120,
  epoch: new Date("2025-12-01T00:00:00.000Z"),
  token: "fake-token"
};

const MINUTE_MS = 60_000;

export const makePlay = (entity: string, n: number, epoch: Date) => ({
  id: `${entity}-${n}`,
  played_at: new Date(epoch.getTime() + n * MINUTE_MS).toISOString(),
  track: { name: `Track ${n}`, popularity: n % 100 }
});

const sendJson = (res: http.ServerResponse, status: number, payload: unknown, headers: Record<string, string> = {}) => {
  res.writeHead(status, { "content-type": "application/json", ...headers });
  res.end(JSON.stringify(payload));
};

export const createFakeCatalogServer = (overrides: Partial<FakeCatalogOptions> = {}) => {
  const options: FakeCatalogOptions = { ...defaultFakeCatalogOptions, ...overrides };
  let rateLimited = 0;

  return http.createServer((req, res) => {
    const host = req.headers.host ?? "localhost";
    const url = new URL(req.url ?? "/", `http://${host}`);

    if (url.pathname === "/api/token") {
      if (req.method !== "POST" || !req.headers.authorization?.startsWith("Basic ")) {
        return sendJson(res, 401, { error: "invalid_client" });
      }
      return sendJson(res, 200, { access_token: options.token, token_type: "Bearer", expires_in: 3600 });
    }

    const match = /^\/v1\/([a-z0-9_-]+)$/.exec(url.pathname);
    if (!match) {
      return sendJson(res, 404, { error: "not_found" });
    }

    if (req.headers.authorization !== `Bearer ${options.token}`) {
      return sendJson(res, 401, { error: "invalid_token" });
    }

    if (rateLimited < (options.rateLimitedResponses ?? 0)) {
      rateLimited += 1;
      return sendJson(res, 429, { error: "rate_limited" }, { "Retry-After": String(options.retryAfterSeconds ?? 0) });
    }

    const entity = match[1] ?? "";
    const after = Number(url.searchParams.get("after") ?? "0");
    const before = Number(url.searchParams.get("before") ?? String(Number.MAX_SAFE_INTEGER));
    const limit = Number(url.searchParams.get("limit") ?? "50");
    const offset = Number(url.searchParams.get("offset") ?? "0");

    const inWindow = [];
    for (let n = 1; n <= options.total; n += 1) {
      const play = makePlay(entity, n, options.epoch);
      const at = Date.parse(play.played_at);
      if (at >= after && at < before) inWindow.push(play);
    }

    const items = inWindow.slice(offset, offset + limit);
    let next: string | null = null;
    if (offset + limit < inWindow.length) {
      const nextUrl = new URL(url.toString());
      nextUrl.searchParams.set("offset", String(offset + limit));
      next = nextUrl.toString();
    }

    return sendJson(res, 200, { items, next });
  });
};

if (require.main === module) {
  const port = Number(process.env.FAKE_CATALOG_PORT ?? 3999);
  createFakeCatalogServer().listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Fake catalog server on http://localhost:${port}/v1`);
  });
}
