import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadConfig, resolveBridgeSettings } from "../../config";
import { parsePort, renderDefaultConfig } from "./init";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("renderDefaultConfig", () => {
  it("produces a config the loader accepts", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "router-bridge-init-"));
    tempDirs.push(dir);
    const configPath = path.join(dir, "config.jsonc");
    fs.writeFileSync(configPath, renderDefaultConfig({ port: 9123 }));

    const result = loadConfig(configPath);

    expect(result.success).toBe(true);
    const settings = resolveBridgeSettings(result.config);
    expect(settings.proxy.port).toBe(9123);
    expect(settings.storage.masterKeyEnv).toBe("ROUTER_BRIDGE_MASTER_KEY");
    expect(settings.storage.path).toBe(
      path.join(os.homedir(), ".router-bridge", "router-bridge.db"),
    );
  });
});

describe("parsePort", () => {
  it("accepts unprivileged ports only", () => {
    expect(parsePort(" 8080 ")).toBe(8080);
    expect(parsePort("80")).toBeUndefined();
    expect(parsePort("70000")).toBeUndefined();
    expect(parsePort("http")).toBeUndefined();
  });
});
