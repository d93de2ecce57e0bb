import os from "node:os";
import path from "node:path";
import type { BridgeConfig } from "./schema";
import { hasUnresolvedEnvVar } from "./env";

export const DEFAULT_UPSTREAM_BASE_URL = "https://openrouter.ai/api/v1";
export const DEFAULT_CREDENTIAL_LABEL = "IDE Assistant Bridge";

/** Fully-defaulted view of the config file that the rest of the bridge consumes. */
export interface BridgeSettings {
  upstream: {
    baseUrl: string;
    provisioningKey?: string;
    timeoutMs: number;
    appName?: string;
    appUrl?: string;
  };
  proxy: {
    host: string;
    port: number;
    allowOrigins: string[];
  };
  catalog: {
    ttlMs: number;
    retryBackoffMs: number;
  };
  credentials: {
    label: string;
    listCacheTtlMs: number;
    limit?: number;
  };
  translation: {
    defaultTemperature: number;
    defaultMaxTokens: number;
  };
  favorites: string[];
  storage: {
    path: string;
    masterKeyEnv: string;
  };
}

function normalizeSecret(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  if (!trimmed || hasUnresolvedEnvVar(trimmed)) {
    return undefined;
  }
  return trimmed;
}

function stripTrailingSlash(url: string): string {
  return url.endsWith("/") ? url.slice(0, -1) : url;
}

export function resolveBridgeSettings(config: BridgeConfig = {}): BridgeSettings {
  const baseDir = config.paths?.baseDir ?? path.join(os.homedir(), ".router-bridge");
  return {
    upstream: {
      baseUrl: stripTrailingSlash(config.upstream?.baseUrl ?? DEFAULT_UPSTREAM_BASE_URL),
      provisioningKey: normalizeSecret(config.upstream?.provisioningKey),
      timeoutMs: config.upstream?.timeoutMs ?? 30_000,
      appName: config.upstream?.appName,
      appUrl: config.upstream?.appUrl,
    },
    proxy: {
      host: config.proxy?.host ?? "127.0.0.1",
      port: config.proxy?.port ?? 8080,
      allowOrigins: config.proxy?.allowOrigins ?? ["*"],
    },
    catalog: {
      ttlMs: config.catalog?.ttlMs ?? 5 * 60_000,
      retryBackoffMs: config.catalog?.retryBackoffMs ?? 30_000,
    },
    credentials: {
      label: config.credentials?.label ?? DEFAULT_CREDENTIAL_LABEL,
      listCacheTtlMs: config.credentials?.listCacheTtlMs ?? 60_000,
      limit: config.credentials?.limit,
    },
    translation: {
      defaultTemperature: config.translation?.defaultTemperature ?? 0.7,
      defaultMaxTokens: config.translation?.defaultMaxTokens ?? 0,
    },
    favorites: [...new Set(config.favorites ?? [])],
    storage: {
      path: config.storage?.path ?? path.join(baseDir, "router-bridge.db"),
      masterKeyEnv: config.storage?.masterKeyEnv ?? "ROUTER_BRIDGE_MASTER_KEY",
    },
  };
}
