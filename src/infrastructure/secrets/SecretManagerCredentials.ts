import { AuthError } from "../../core/ingestion/errors";
import type { ClientCredentials } from "../catalog/ClientCredentialsTokenProvider";

/** The slice of `SecretManagerServiceClient` this reader calls. */
export type SecretVersionReader = {
  accessSecretVersion(request: { name: string }): Promise<
    [{ payload?: { data?: Uint8Array | string | null } | null }, ...unknown[]]
  >;
  close(): Promise<void>;
};

export type CredentialSecretIds = {
  clientId: string;
  clientSecret: string;
};

export const defaultCredentialSecretIds: CredentialSecretIds = {
  clientId: "spotify-client-id",
  clientSecret: "spotify-client-secret"
};

const decodePayload = (data: Uint8Array | string | null | undefined): string => {
  if (data == null) return "";
  return typeof data === "string" ? data : Buffer.from(data).toString("utf8");
};

/**
 * Fills in catalog client credentials the environment left unset from the
 * latest version of the project's secrets.
 */
export class SecretManagerCredentials {
  constructor(
    private readonly client: SecretVersionReader,
    private readonly projectId: string,
    private readonly secretIds: CredentialSecretIds = defaultCredentialSecretIds
  ) {}

  secretName(secretId: string): string {
    return `projects/${this.projectId}/secrets/${secretId}/versions/latest`;
  }

  async readSecret(secretId: string): Promise<string> {
    let data: Uint8Array | string | null | undefined;
    try {
      const [version] = await this.client.accessSecretVersion({ name: this.secretName(secretId) });
      data = version.payload?.data;
    } catch (err) {
      throw new AuthError(`Secret ${secretId} could not be read`, { code: "secret_unavailable", cause: err });
    }

    const value = decodePayload(data).trim();
    if (!value) {
      throw new AuthError(`Secret ${secretId} is empty`, { code: "secret_empty" });
    }

    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ event: "credentials.secret_loaded", secretId, projectId: this.projectId }));
    return value;
  }

  async resolve(known: Partial<ClientCredentials> = {}): Promise<ClientCredentials> {
    const clientId = known.clientId || (await this.readSecret(this.secretIds.clientId));
    const clientSecret = known.clientSecret || (await this.readSecret(this.secretIds.clientSecret));
    return { clientId, clientSecret };
  }

  close(): Promise<void> {
    return this.client.close();
  }
}
