import { loadConfig, resolveBridgeSettings } from "../../config";
import { configureLogger } from "../../logger";
import { initDb } from "../../storage/db";
import { BridgeHost, type BridgeHostOptions } from "./index";

export class BridgeConfigError extends Error {
  constructor(
    readonly configPath: string,
    readonly errors: string[],
  ) {
    super(`Invalid configuration at ${configPath}: ${errors.join("; ")}`);
    this.name = "BridgeConfigError";
  }
}

export interface OpenedBridge {
  host: BridgeHost;
  configPath: string;
}

/** Loads config, applies the log level, opens the database and builds the host. */
export function openBridge(configPath?: string, options: BridgeHostOptions = {}): OpenedBridge {
  const result = loadConfig(configPath);
  if (!result.success || !result.config) {
    throw new BridgeConfigError(result.path, result.errors ?? []);
  }
  configureLogger(result.config.logging?.level);
  const settings = resolveBridgeSettings(result.config);
  initDb(settings.storage.path);
  return { host: new BridgeHost(settings, options), configPath: result.path };
}
