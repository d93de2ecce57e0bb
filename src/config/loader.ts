import { config as loadDotEnv } from "dotenv";
import { parse as parseJsonc, printParseErrorCode, type ParseError } from "jsonc-parser";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { replaceEnvVars } from "./env";
import { BridgeConfigSchema, type BridgeConfig } from "./schema";

export interface ConfigLoadResult {
  success: boolean;
  config?: BridgeConfig;
  errors?: string[];
  path: string;
}

const DEFAULT_DIR_NAME = ".router-bridge";
const DEFAULT_DB_NAME = "router-bridge.db";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expandHomePath(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.startsWith("~")) {
    return raw;
  }
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return raw;
}

export function resolveConfigPath(customPath?: string): string {
  const envPath = process.env.ROUTER_BRIDGE_CONFIG;
  if (customPath) {
    return path.resolve(customPath);
  }
  if (envPath) {
    return path.resolve(envPath);
  }
  return path.join(os.homedir(), DEFAULT_DIR_NAME, "config.jsonc");
}

export function applyConfigDefaults(raw: unknown): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const obj = { ...raw };
  const paths = isRecord(obj.paths) ? { ...obj.paths } : {};
  const configuredBaseDir =
    typeof paths.baseDir === "string" && paths.baseDir.trim()
      ? expandHomePath(paths.baseDir)
      : undefined;
  const baseDir = configuredBaseDir ?? path.join(os.homedir(), DEFAULT_DIR_NAME);
  paths.baseDir = baseDir;
  obj.paths = paths;

  const storage = isRecord(obj.storage) ? { ...obj.storage } : {};
  storage.path =
    typeof storage.path === "string"
      ? expandHomePath(storage.path)
      : path.join(baseDir, DEFAULT_DB_NAME);
  obj.storage = storage;

  if (!Object.hasOwn(obj, "logging")) {
    obj.logging = { level: "info" };
    return obj;
  }

  if (isRecord(obj.logging)) {
    const logging = { ...obj.logging };
    if (!Object.hasOwn(logging, "level")) {
      logging.level = "info";
    }
    obj.logging = logging;
  }

  return obj;
}

function loadConfigLocalEnv(resolvedPath: string): void {
  const envPath = path.join(path.dirname(resolvedPath), ".env");
  if (!fs.existsSync(envPath)) {
    return;
  }
  const result = loadDotEnv({ path: envPath, override: false, quiet: true });
  if (result.error) {
    throw result.error;
  }
}

function parseConfigText(raw: string): { value: unknown; errors: string[] } {
  const parseErrors: ParseError[] = [];
  const value: unknown = parseJsonc(raw, parseErrors, { allowTrailingComma: true });
  return {
    value,
    errors: parseErrors.map(
      (error) => `offset ${error.offset}: ${printParseErrorCode(error.error)}`,
    ),
  };
}

export function loadConfig(configPath?: string): ConfigLoadResult {
  const resolvedPath = resolveConfigPath(configPath);
  if (!fs.existsSync(resolvedPath)) {
    return {
      success: false,
      errors: [`Config file not found: ${resolvedPath}`],
      path: resolvedPath,
    };
  }

  try {
    loadConfigLocalEnv(resolvedPath);
    const parsed = parseConfigText(fs.readFileSync(resolvedPath, "utf-8"));
    if (parsed.errors.length > 0) {
      return { success: false, errors: parsed.errors, path: resolvedPath };
    }
    const config = applyConfigDefaults(replaceEnvVars(parsed.value));

    const result = BridgeConfigSchema.safeParse(config);
    if (!result.success) {
      const errors = result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      );
      return { success: false, errors, path: resolvedPath };
    }

    return { success: true, config: result.data, path: resolvedPath };
  } catch (error) {
    return {
      success: false,
      errors: [error instanceof Error ? error.message : String(error)],
      path: resolvedPath,
    };
  }
}
