import { describe, expect, it } from "vitest";
import { DEFAULT_CREDENTIAL_LABEL, resolveBridgeSettings } from "./settings";

describe("resolveBridgeSettings", () => {
  it("fills every default", () => {
    const settings = resolveBridgeSettings({ paths: { baseDir: "/srv/bridge" } });

    expect(settings.upstream.baseUrl).toBe("https://openrouter.ai/api/v1");
    expect(settings.upstream.provisioningKey).toBeUndefined();
    expect(settings.proxy).toEqual({ host: "127.0.0.1", port: 8080, allowOrigins: ["*"] });
    expect(settings.catalog).toEqual({ ttlMs: 300_000, retryBackoffMs: 30_000 });
    expect(settings.credentials).toEqual({
      label: DEFAULT_CREDENTIAL_LABEL,
      listCacheTtlMs: 60_000,
      limit: undefined,
    });
    expect(settings.translation).toEqual({ defaultTemperature: 0.7, defaultMaxTokens: 0 });
    expect(settings.storage.path).toBe("/srv/bridge/router-bridge.db");
    expect(settings.storage.masterKeyEnv).toBe("ROUTER_BRIDGE_MASTER_KEY");
  });

  it("drops a provisioning key whose placeholder was never resolved", () => {
    const settings = resolveBridgeSettings({
      upstream: { provisioningKey: "${ROUTER_PROVISIONING_KEY}" },
    });
    expect(settings.upstream.provisioningKey).toBeUndefined();
  });

  it("trims the base url and deduplicates favorites in order", () => {
    const settings = resolveBridgeSettings({
      upstream: { baseUrl: "http://localhost:9999/api/v1/" },
      favorites: ["b/model", "a/model", "b/model"],
    });
    expect(settings.upstream.baseUrl).toBe("http://localhost:9999/api/v1");
    expect(settings.favorites).toEqual(["b/model", "a/model"]);
  });
});
