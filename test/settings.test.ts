import { describe, expect, it } from "vitest";
import {
  parseDefaultsUpdate,
  resolveConnectionSettings,
  resolveSettings,
} from "../src/config/settings.js";

describe("resolveSettings", () => {
  it("fills in defaults", () => {
    expect(resolveSettings({ bucket: "datasets" }, {}, {})).toEqual({
      rootFolder: "Dataset",
      bucket: "datasets",
      region: "us-east-1",
      clientSecretPath: "credentials.json",
      concurrency: 1,
      timeoutMs: 60_000,
    });
  });

  it("prefers flags over environment over the config file", () => {
    const defaults = { bucket: "from-config", rootFolder: "ConfigRoot" };
    const env = { DRIVE_S3_SYNC_BUCKET: "from-env", BUCKET_NAME: "legacy" };

    expect(resolveSettings({ bucket: "from-flag" }, defaults, env).bucket).toBe(
      "from-flag"
    );
    expect(resolveSettings({}, defaults, env).bucket).toBe("from-env");
    expect(resolveSettings({}, defaults, { BUCKET_NAME: "legacy" }).bucket).toBe(
      "legacy"
    );
    expect(resolveSettings({}, defaults, {}).bucket).toBe("from-config");
    expect(resolveSettings({}, defaults, {}).rootFolder).toBe("ConfigRoot");
  });

  it("ignores empty environment values", () => {
    expect(
      resolveSettings({}, { bucket: "from-config" }, { DRIVE_S3_SYNC_BUCKET: "" })
        .bucket
    ).toBe("from-config");
  });

  it("reads the original environment names", () => {
    const settings = resolveSettings(
      {},
      {},
      {
        BUCKET_NAME: "datasets",
        SERVICE_ACCOUNT_FILE: "sa.json",
        S3_ENDPOINT_URL: "http://localhost:4566",
        AWS_REGION: "eu-west-1",
      }
    );

    expect(settings.serviceAccountPath).toBe("sa.json");
    expect(settings.endpoint).toBe("http://localhost:4566");
    expect(settings.region).toBe("eu-west-1");
  });

  it("coerces numeric flags", () => {
    const settings = resolveSettings(
      { bucket: "b", concurrency: "4", timeout: "1500" },
      {},
      {}
    );

    expect(settings.concurrency).toBe(4);
    expect(settings.timeoutMs).toBe(1500);
  });

  it("rejects a missing bucket", () => {
    expect(() => resolveSettings({}, {}, {})).toThrow(
      "Invalid settings: No bucket configured. Pass --bucket or set DRIVE_S3_SYNC_BUCKET."
    );
  });

  it("rejects invalid concurrency", () => {
    expect(() => resolveSettings({ bucket: "b", concurrency: "0" }, {}, {})).toThrow(
      "Invalid settings: concurrency must be at least 1"
    );
    expect(() => resolveSettings({ bucket: "b", concurrency: "2.5" }, {}, {})).toThrow(
      "Invalid settings: concurrency must be a whole number"
    );
  });

  it("rejects an endpoint that is not a URL", () => {
    expect(() => resolveSettings({ bucket: "b", endpoint: "localstack" }, {}, {})).toThrow(
      "Invalid settings"
    );
  });
});

describe("resolveConnectionSettings", () => {
  it("resolves browsing settings without a bucket", () => {
    expect(
      resolveConnectionSettings(
        { timeout: "2500" },
        { clientSecretPath: "client.json" },
        { SERVICE_ACCOUNT_FILE: "sa.json" }
      )
    ).toEqual({
      clientSecretPath: "client.json",
      serviceAccountPath: "sa.json",
      timeoutMs: 2500,
    });
  });

  it("takes the timeout from the environment and the config file", () => {
    expect(
      resolveConnectionSettings({}, { timeoutMs: 9000 }, { DRIVE_S3_SYNC_TIMEOUT_MS: "3000" })
        .timeoutMs
    ).toBe(3000);
    expect(resolveConnectionSettings({}, { timeoutMs: 9000 }, {}).timeoutMs).toBe(9000);
  });

  it("rejects a timeout that is not a number", () => {
    expect(() => resolveConnectionSettings({ timeout: "soon" }, {}, {})).toThrow(
      "Invalid settings: timeout must be a number of milliseconds"
    );
  });
});

describe("parseDefaultsUpdate", () => {
  it("coerces numeric values", () => {
    expect(parseDefaultsUpdate("concurrency", "4")).toEqual({ concurrency: 4 });
    expect(parseDefaultsUpdate("timeoutMs", "1500")).toEqual({ timeoutMs: 1500 });
  });

  it("keeps text values as given", () => {
    expect(parseDefaultsUpdate("bucket", "datasets")).toEqual({ bucket: "datasets" });
  });

  it("reports invalid values readably", () => {
    expect(() => parseDefaultsUpdate("concurrency", "abc")).toThrow(
      'Invalid value "abc": concurrency must be a number'
    );
    expect(() => parseDefaultsUpdate("concurrency", "0")).toThrow(
      'Invalid value "0": concurrency must be at least 1'
    );
    expect(() => parseDefaultsUpdate("endpoint", "localstack")).toThrow(
      'Invalid value "localstack": endpoint must be a URL'
    );
  });
});
