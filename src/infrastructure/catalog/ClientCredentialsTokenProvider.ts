import type { TokenProvider } from "../../ports/TokenProvider";
import { AuthError, TransientNetworkError } from "../../core/ingestion/errors";

export type ClientCredentials = {
  clientId: string;
  clientSecret: string;
};

/** Resolves credentials on first use, e.g. from Secret Manager. */
export type ClientCredentialsLoader = () => Promise<ClientCredentials>;

type CachedToken = {
  value: string;
  expiresAt: number;
};

const EXPIRY_SKEW_MS = 60_000;
const DEFAULT_EXPIRES_IN_S = 3600;

export class StaticTokenProvider implements TokenProvider {
  constructor(private readonly token: string) {}

  async getToken(): Promise<string> {
    return this.token;
  }

  invalidate(): void {
    // a static token cannot be refreshed
  }
}

/**
 * OAuth2 client-credentials flow against the catalog's token endpoint.
 * The token is cached until shortly before `expires_in` elapses; loaded
 * credentials are kept for the provider's lifetime.
 */
export class ClientCredentialsTokenProvider implements TokenProvider {
  private cached?: CachedToken;
  private credentials?: ClientCredentials;

  constructor(
    private readonly tokenUrl: string,
    private readonly source: ClientCredentials | ClientCredentialsLoader,
    private readonly timeoutMs = 8000,
    private readonly now: () => number = Date.now
  ) {}

  async getToken(): Promise<string> {
    if (this.cached && this.now() < this.cached.expiresAt) {
      return this.cached.value;
    }

    const token = await this.requestToken();
    this.cached = token;
    return token.value;
  }

  invalidate(): void {
    this.cached = undefined;
  }

  private async loadCredentials(): Promise<ClientCredentials> {
    if (!this.credentials) {
      this.credentials = typeof this.source === "function" ? await this.source() : this.source;
    }
    return this.credentials;
  }

  private async requestToken(): Promise<CachedToken> {
    const { clientId, clientSecret } = await this.loadCredentials();
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString("base64");
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let res: Response;
    try {
      res = await fetch(this.tokenUrl, {
        method: "POST",
        headers: {
          Authorization: `Basic ${basic}`,
          "Content-Type": "application/x-www-form-urlencoded"
        },
        body: new URLSearchParams({ grant_type: "client_credentials" }).toString(),
        signal: controller.signal
      });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new TransientNetworkError(`Token request timeout after ${this.timeoutMs}ms`, {
          isTimeout: true,
          requestUrl: this.tokenUrl
        });
      }
      throw new TransientNetworkError("Token request failed", { requestUrl: this.tokenUrl, cause: err });
    } finally {
      clearTimeout(timeout);
    }

    if (!res.ok) {
      await res.text().catch(() => "");
      if (res.status >= 500) {
        throw new TransientNetworkError(`Token request failed: ${res.status}`, {
          status: res.status,
          requestUrl: this.tokenUrl
        });
      }
      throw new AuthError(`Token request rejected: ${res.status}`, {
        status: res.status,
        requestUrl: this.tokenUrl
      });
    }

    const body: unknown = await res.json().catch(() => undefined);
    if (typeof body !== "object" || body === null) {
      throw new AuthError("Token response is not a JSON object", { requestUrl: this.tokenUrl });
    }

    const accessToken = "access_token" in body ? body.access_token : undefined;
    if (typeof accessToken !== "string" || accessToken === "") {
      throw new AuthError("Token response has no access_token", { requestUrl: this.tokenUrl });
    }

    const expiresIn = "expires_in" in body && typeof body.expires_in === "number" && body.expires_in > 0
      ? body.expires_in
      : DEFAULT_EXPIRES_IN_S;

    return {
      value: accessToken,
      expiresAt: this.now() + Math.max(0, expiresIn * 1000 - EXPIRY_SKEW_MS)
    };
  }
}
