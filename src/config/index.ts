export { loadConfig, resolveConfigPath, applyConfigDefaults, type ConfigLoadResult } from "./loader";
export { BridgeConfigSchema, type BridgeConfig } from "./schema";
export {
  resolveBridgeSettings,
  DEFAULT_CREDENTIAL_LABEL,
  DEFAULT_UPSTREAM_BASE_URL,
  type BridgeSettings,
} from "./settings";
