const ENV_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Substitutes `${NAME}` and `${NAME:-fallback}` placeholders in every string of a parsed
 * config tree. Unset variables without a fallback keep their placeholder so that schema
 * validation can point at them.
 */
export function replaceEnvVars(
  config: unknown,
  env: Record<string, string | undefined> = process.env,
): unknown {
  if (typeof config === "string") {
    return config.replace(ENV_PATTERN, (match, key: string, fallback: string | undefined) => {
      const value = env[key];
      if (value !== undefined && value !== "") {
        return value;
      }
      if (fallback !== undefined) {
        return fallback;
      }
      return value ?? match;
    });
  }

  if (Array.isArray(config)) {
    return config.map((item) => replaceEnvVars(item, env));
  }

  if (isPlainObject(config)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(config)) {
      result[key] = replaceEnvVars(value, env);
    }
    return result;
  }

  return config;
}

/** True when a config string still carries an unresolved placeholder. */
export function hasUnresolvedEnvVar(value: string): boolean {
  return new RegExp(ENV_PATTERN.source).test(value);
}
