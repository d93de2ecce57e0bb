import fs from "node:fs/promises";
import path from "node:path";
import { resolveConfigPath } from "../../config";

/** The .env beside the config file; the loader reads it before substituting placeholders. */
export function envFilePath(configPath?: string): string {
  return path.join(path.dirname(resolveConfigPath(configPath)), ".env");
}

export function parseEnvFile(content: string): Map<string, string> {
  const map = new Map<string, string>();
  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) {
      continue;
    }
    const idx = line.indexOf("=");
    if (idx <= 0) {
      continue;
    }
    const key = line.slice(0, idx).trim();
    if (key) {
      map.set(key, line.slice(idx + 1).trim());
    }
  }
  return map;
}

async function readIfExists(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return "";
    }
    throw error;
  }
}

/** Sets `key=value` in the file, keeping other entries. Existing keys are replaced unless `keepExisting`. */
export async function upsertEnvValue(
  filePath: string,
  key: string,
  value: string,
  options: { keepExisting?: boolean } = {},
): Promise<boolean> {
  const lines = (await readIfExists(filePath))
    .split("\n")
    .filter((line) => line.trim().length > 0 && !line.trim().startsWith("#"));
  const index = lines.findIndex((line) => line.startsWith(`${key}=`));
  if (index >= 0 && options.keepExisting) {
    return false;
  }
  const newLine = `${key}=${value}`;
  if (index >= 0) {
    lines[index] = newLine;
  } else {
    lines.push(newLine);
  }

  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${lines.join("\n")}\n`, { mode: 0o600 });
  return true;
}
