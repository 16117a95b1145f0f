import {
  ClientCredentialsTokenProvider,
  StaticTokenProvider
} from "../../src/infrastructure/catalog/ClientCredentialsTokenProvider";
import { AuthError, TransientNetworkError } from "../../src/core/ingestion/errors";
import { readRequestBody, sendJson, startServer } from "../helpers/http-server";

describe("StaticTokenProvider", () => {
  it("always returns the configured token", async () => {
    const provider = new StaticTokenProvider("test-token");
    provider.invalidate();
    await expect(provider.getToken()).resolves.toBe("test-token");
  });
});

describe("ClientCredentialsTokenProvider", () => {
  it("posts client credentials with basic auth and caches the token", async () => {
    const seen: Array<{ authorization?: string; body: string }> = [];
    const server = await startServer((req, res) => {
      readRequestBody(req).then((body) => {
        seen.push({ authorization: req.headers.authorization, body });
        sendJson(res, 200, { access_token: `token-${seen.length}`, token_type: "Bearer", expires_in: 3600 });
      }, () => res.destroy());
    });

    const provider = new ClientCredentialsTokenProvider(`${server.baseUrl}/api/token`, { clientId: "client-id", clientSecret: "client-secret" });

    await expect(provider.getToken()).resolves.toBe("token-1");
    await expect(provider.getToken()).resolves.toBe("token-1");

    expect(seen).toEqual([
      {
        authorization: `Basic ${Buffer.from("client-id:client-secret").toString("base64")}`,
        body: "grant_type=client_credentials"
      }
    ]);

    await server.close();
  });

  it("requests a new token after invalidate", async () => {
    let issued = 0;
    const server = await startServer((_req, res) => {
      issued += 1;
      sendJson(res, 200, { access_token: `token-${issued}`, expires_in: 3600 });
    });

    const provider = new ClientCredentialsTokenProvider(`${server.baseUrl}/api/token`, { clientId: "client-id", clientSecret: "client-secret" });
    await provider.getToken();
    provider.invalidate();

    await expect(provider.getToken()).resolves.toBe("token-2");

    await server.close();
  });

  it("refreshes a minute before expires_in elapses", async () => {
    let issued = 0;
    const server = await startServer((_req, res) => {
      issued += 1;
      sendJson(res, 200, { access_token: `token-${issued}`, expires_in: 120 });
    });

    let clock = 1_000_000;
    const provider = new ClientCredentialsTokenProvider(
      `${server.baseUrl}/api/token`,
      { clientId: "client-id", clientSecret: "client-secret" },
      8000,
      () => clock
    );

    await expect(provider.getToken()).resolves.toBe("token-1");
    clock += 59_999;
    await expect(provider.getToken()).resolves.toBe("token-1");
    clock += 1;
    await expect(provider.getToken()).resolves.toBe("token-2");

    await server.close();
  });

  it("maps a rejected credential exchange to AuthError", async () => {
    const server = await startServer((_req, res) => sendJson(res, 400, { error: "invalid_client" }));
    const provider = new ClientCredentialsTokenProvider(`${server.baseUrl}/api/token`, { clientId: "client-id", clientSecret: "wrong-secret" });

    const error = await provider.getToken().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ status: 400, message: "Token request rejected: 400" });

    await server.close();
  });

  it("maps token endpoint outages to TransientNetworkError", async () => {
    const server = await startServer((_req, res) => sendJson(res, 503, { error: "unavailable" }));
    const provider = new ClientCredentialsTokenProvider(`${server.baseUrl}/api/token`, { clientId: "client-id", clientSecret: "client-secret" });

    await expect(provider.getToken()).rejects.toBeInstanceOf(TransientNetworkError);

    await server.close();
  });

  it("loads credentials lazily, once, from a loader", async () => {
    const seen: Array<string | undefined> = [];
    let issued = 0;
    const server = await startServer((req, res) => {
      issued += 1;
      seen.push(req.headers.authorization);
      sendJson(res, 200, { access_token: `token-${issued}`, expires_in: 3600 });
    });

    const loader = jest.fn().mockResolvedValue({ clientId: "secret-id", clientSecret: "secret-value" });
    const provider = new ClientCredentialsTokenProvider(`${server.baseUrl}/api/token`, loader);
    expect(loader).not.toHaveBeenCalled();

    await provider.getToken();
    provider.invalidate();
    await expect(provider.getToken()).resolves.toBe("token-2");

    expect(loader).toHaveBeenCalledTimes(1);
    expect(seen).toEqual([
      `Basic ${Buffer.from("secret-id:secret-value").toString("base64")}`,
      `Basic ${Buffer.from("secret-id:secret-value").toString("base64")}`
    ]);

    await server.close();
  });

  it("asks the loader again after it failed", async () => {
    const server = await startServer((_req, res) => sendJson(res, 200, { access_token: "token-1" }));
    const loader = jest
      .fn()
      .mockRejectedValueOnce(new AuthError("Secret spotify-client-id could not be read"))
      .mockResolvedValueOnce({ clientId: "client-id", clientSecret: "client-secret" });
    const provider = new ClientCredentialsTokenProvider(`${server.baseUrl}/api/token`, loader);

    await expect(provider.getToken()).rejects.toThrow("Secret spotify-client-id could not be read");
    await expect(provider.getToken()).resolves.toBe("token-1");
    expect(loader).toHaveBeenCalledTimes(2);

    await server.close();
  });

  it("rejects a response without access_token", async () => {
    const server = await startServer((_req, res) => sendJson(res, 200, { token_type: "Bearer" }));
    const provider = new ClientCredentialsTokenProvider(`${server.baseUrl}/api/token`, { clientId: "client-id", clientSecret: "client-secret" });

    await expect(provider.getToken()).rejects.toThrow("Token response has no access_token");

    await server.close();
  });
});
