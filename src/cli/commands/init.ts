import { confirm, input, password } from "@inquirer/prompts";
import { randomBytes } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import pc from "picocolors";
import { resolveConfigPath } from "../../config";
import { envFilePath, upsertEnvValue } from "./env-file";

export const MASTER_KEY_ENV = "ROUTER_BRIDGE_MASTER_KEY";
export const PROVISIONING_KEY_ENV = "ROUTER_BRIDGE_PROVISIONING_KEY";

export interface InitAnswers {
  port: number;
  provisioningKey?: string;
}

export function renderDefaultConfig(answers: InitAnswers): string {
  return `{
  // Account key used only to create and delete the bridge's delegated key.
  "upstream": {
    "provisioningKey": "\${${PROVISIONING_KEY_ENV}}"
  },
  "proxy": {
    "host": "127.0.0.1",
    "port": ${answers.port}
  },
  "storage": {
    "masterKeyEnv": "${MASTER_KEY_ENV}"
  },
  "favorites": [],
  "logging": {
    "level": "info"
  }
}
`;
}

export function parsePort(raw: string): number | undefined {
  const port = Number(raw.trim());
  return Number.isInteger(port) && port >= 1024 && port <= 65535 ? port : undefined;
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function promptAnswers(nonInteractive: boolean): Promise<InitAnswers> {
  if (nonInteractive) {
    return { port: 8080 };
  }
  const port = await input({
    message: "Local port for the bridge:",
    default: "8080",
    validate: (v) => (parsePort(v) !== undefined ? true : "Use a port between 1024 and 65535"),
  });
  const provisioningKey = await password({
    message: "Provisioning key (leave empty to set an API key manually later):",
    mask: "*",
  });
  return { port: parsePort(port) ?? 8080, provisioningKey: provisioningKey.trim() || undefined };
}

export async function runInit(options: {
  config?: string;
  reset?: boolean;
  nonInteractive?: boolean;
}): Promise<void> {
  const configPath = resolveConfigPath(options.config);
  if ((await fileExists(configPath)) && !options.reset) {
    const overwrite =
      !options.nonInteractive &&
      (await confirm({ message: `${configPath} exists. Overwrite?`, default: false }));
    if (!overwrite) {
      console.log(pc.yellow(`Keeping existing config at ${configPath}`));
      return;
    }
  }

  const answers = await promptAnswers(Boolean(options.nonInteractive));
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  await fs.writeFile(configPath, renderDefaultConfig(answers), "utf-8");
  console.log(pc.green(`Wrote ${configPath}`));

  const envPath = envFilePath(options.config);
  const createdKey = await upsertEnvValue(
    envPath,
    MASTER_KEY_ENV,
    randomBytes(32).toString("base64"),
    { keepExisting: true },
  );
  if (createdKey) {
    console.log(pc.green(`Generated ${MASTER_KEY_ENV} in ${envPath}`));
  }
  if (answers.provisioningKey) {
    await upsertEnvValue(envPath, PROVISIONING_KEY_ENV, answers.provisioningKey);
    console.log(pc.green(`Saved ${PROVISIONING_KEY_ENV} to ${envPath}`));
  }
  console.log(pc.dim("Start the bridge with `router-bridge start`."));
}
