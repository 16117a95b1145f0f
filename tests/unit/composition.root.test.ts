describe("composition root", () => {
  const envSnapshot = { ...process.env };

  const baseEnv = {
    SOURCE_ACCESS_TOKEN: "test-token",
    GCS_BUCKET: "raw-bucket"
  };

  const mockStorage = () => {
    const bucket = jest.fn().mockImplementation((name: string) => ({ name }));
    const storageCtor = jest.fn().mockImplementation(() => ({ bucket }));
    jest.doMock("@google-cloud/storage", () => ({ Storage: storageCtor }));
    return { storageCtor, bucket };
  };

  afterEach(() => {
    process.env = { ...envSnapshot };
    jest.resetModules();
    jest.restoreAllMocks();
  });

  it("wires the GCS landing writer and watermark store by default", async () => {
    const { storageCtor, bucket } = mockStorage();
    const report = { invocationId: "inv-1" };
    const ingestWindow = jest.fn().mockResolvedValue(report);
    jest.doMock("../../src/application/ingest-window/ingestWindow.usecase", () => ({ ingestWindow }));

    const { createIngestionRuntime } = await import("../../src/composition/root");
    const { MusicCatalogHttpClient } = await import("../../src/infrastructure/catalog/MusicCatalogHttpClient");
    const { GcsRawLandingWriter } = await import("../../src/infrastructure/gcs/GcsRawLandingWriter");
    const { GcsWatermarkStore } = await import("../../src/infrastructure/gcs/GcsWatermarkStore");
    const { NoopDownstreamTrigger } = await import("../../src/infrastructure/downstream/HttpDownstreamTrigger");

    const runtime = createIngestionRuntime(baseEnv);
    await expect(runtime.run({ dryRun: true })).resolves.toBe(report);

    expect(runtime.port).toBe(8080);
    expect(storageCtor).toHaveBeenCalledWith();
    expect(bucket).toHaveBeenCalledWith("raw-bucket");
    expect(ingestWindow).toHaveBeenCalledWith(
      {
        source: expect.any(MusicCatalogHttpClient),
        landing: expect.any(GcsRawLandingWriter),
        watermarks: expect.any(GcsWatermarkStore),
        downstream: expect.any(NoopDownstreamTrigger),
        config: {
          entity: "tracks",
          timeZone: "UTC",
          initialLookbackHours: 24,
          writeRetries: 3,
          minDelayMs: 250,
          maxDelayMs: 5000
        }
      },
      { dryRun: true }
    );
  });

  it("uses Mongo watermarks, client credentials and the HTTP trigger when configured, closing Mongo after the run", async () => {
    process.env = {
      ...envSnapshot,
      SOURCE_CLIENT_ID: "client-id",
      SOURCE_CLIENT_SECRET: "client-secret",
      SOURCE_ACCESS_TOKEN: "",
      GCS_BUCKET: "raw-bucket",
      GCP_PROJECT: "test-project",
      WATERMARK_STORE: "mongo",
      DOWNSTREAM_TRIGGER_URL: "http://localhost:4000/jobs/transform",
      INGEST_ENTITY: "recently_played",
      SOURCE_TIMEOUT_MS: "1200"
    };

    const { storageCtor } = mockStorage();
    const close = jest.fn().mockResolvedValue(undefined);
    const mongoStore = { close };
    const mongoCtor = jest.fn().mockImplementation(() => mongoStore);
    const tokenCtor = jest.fn().mockImplementation(() => ({}));
    const ingestWindow = jest.fn().mockResolvedValue({ invocationId: "inv-1" });

    jest.doMock("../../src/infrastructure/mongo/MongoWatermarkStore", () => ({ MongoWatermarkStore: mongoCtor }));
    jest.doMock("../../src/infrastructure/catalog/ClientCredentialsTokenProvider", () => ({
      ClientCredentialsTokenProvider: tokenCtor,
      StaticTokenProvider: jest.fn()
    }));
    jest.doMock("../../src/application/ingest-window/ingestWindow.usecase", () => ({ ingestWindow }));

    const { runIngestion } = await import("../../src/composition/root");
    const { HttpDownstreamTrigger } = await import("../../src/infrastructure/downstream/HttpDownstreamTrigger");
    await runIngestion();

    expect(storageCtor).toHaveBeenCalledWith({ projectId: "test-project" });
    expect(tokenCtor).toHaveBeenCalledWith(
      "https://accounts.spotify.com/api/token",
      { clientId: "client-id", clientSecret: "client-secret" },
      1200
    );
    expect(mongoCtor).toHaveBeenCalledWith("mongodb://localhost:27017/artist_pulse");
    expect(ingestWindow).toHaveBeenCalledWith(
      expect.objectContaining({
        watermarks: mongoStore,
        downstream: expect.any(HttpDownstreamTrigger),
        config: expect.objectContaining({ entity: "recently_played" })
      }),
      undefined
    );
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("reads unset client credentials from Secret Manager and closes its client", async () => {
    process.env = {
      ...envSnapshot,
      SOURCE_CLIENT_ID: "",
      SOURCE_CLIENT_SECRET: "",
      SOURCE_ACCESS_TOKEN: "",
      GCS_BUCKET: "raw-bucket",
      GCP_PROJECT: "test-project",
      WATERMARK_STORE: "gcs",
      SECRET_CLIENT_ID_NAME: "",
      SECRET_CLIENT_SECRET_NAME: ""
    };

    mockStorage();
    const secretValues: Record<string, string> = {
      "projects/test-project/secrets/spotify-client-id/versions/latest": "secret-id",
      "projects/test-project/secrets/spotify-client-secret/versions/latest": "secret-value"
    };
    const accessSecretVersion = jest.fn().mockImplementation(async ({ name }: { name: string }) => [
      { payload: { data: Buffer.from(secretValues[name] ?? "") } }
    ]);
    const secretsClose = jest.fn().mockResolvedValue(undefined);
    const secretClientCtor = jest.fn().mockImplementation(() => ({ accessSecretVersion, close: secretsClose }));
    jest.doMock("@google-cloud/secret-manager", () => ({ SecretManagerServiceClient: secretClientCtor }));

    const tokenCtor = jest.fn().mockImplementation(() => ({}));
    jest.doMock("../../src/infrastructure/catalog/ClientCredentialsTokenProvider", () => ({
      ClientCredentialsTokenProvider: tokenCtor,
      StaticTokenProvider: jest.fn()
    }));
    jest.doMock("../../src/application/ingest-window/ingestWindow.usecase", () => ({
      ingestWindow: jest.fn().mockResolvedValue({ invocationId: "inv-1" })
    }));
    const logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);

    const { runIngestion } = await import("../../src/composition/root");
    await runIngestion();

    expect(secretClientCtor).toHaveBeenCalledWith({ projectId: "test-project" });
    const loader: unknown = tokenCtor.mock.calls[0]?.[1];
    expect(typeof loader).toBe("function");
    if (typeof loader !== "function") return;
    await expect(loader()).resolves.toEqual({ clientId: "secret-id", clientSecret: "secret-value" });
    expect(accessSecretVersion).toHaveBeenCalledTimes(2);
    expect(secretsClose).toHaveBeenCalledTimes(1);
    logSpy.mockRestore();
  });

  it("closes Mongo when the run fails", async () => {
    process.env = { ...envSnapshot, ...baseEnv, WATERMARK_STORE: "mongo" };

    mockStorage();
    const close = jest.fn().mockResolvedValue(undefined);
    jest.doMock("../../src/infrastructure/mongo/MongoWatermarkStore", () => ({
      MongoWatermarkStore: jest.fn().mockImplementation(() => ({ close }))
    }));
    jest.doMock("../../src/application/ingest-window/ingestWindow.usecase", () => ({
      ingestWindow: jest.fn().mockRejectedValue(new Error("ingest failed"))
    }));

    const { runIngestion } = await import("../../src/composition/root");
    await expect(runIngestion()).rejects.toThrow("ingest failed");
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("fails fast when runtime caps are violated", async () => {
    process.env = { ...envSnapshot, ...baseEnv, SOURCE_PAGE_SIZE: "999" };

    mockStorage();
    jest.doMock("../../src/application/ingest-window/ingestWindow.usecase", () => ({ ingestWindow: jest.fn() }));

    const { runIngestion } = await import("../../src/composition/root");
    await expect(runIngestion()).rejects.toThrow("SOURCE_PAGE_SIZE=999 is out of allowed range [1..50]");
  });
});
