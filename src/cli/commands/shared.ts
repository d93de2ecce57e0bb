import pc from "picocolors";
import type { CredentialCheckOutcome } from "../../credentials";
import { BridgeConfigError, openBridge, type OpenedBridge } from "../../runtime/host/bootstrap";
import type { BridgeHost } from "../../runtime/host";

export interface GlobalOptions {
  config?: string;
}

function openOrReport(configPath?: string): OpenedBridge | undefined {
  try {
    return openBridge(configPath);
  } catch (error) {
    if (error instanceof BridgeConfigError) {
      console.error(pc.red(`Config invalid: ${error.configPath}`));
      for (const message of error.errors) {
        console.error(pc.red(`  - ${message}`));
      }
      console.error(pc.dim("Run `router-bridge init` to create a config."));
      process.exitCode = 1;
      return undefined;
    }
    throw error;
  }
}

/** Opens the bridge for a one-shot command and always releases the database. */
export async function withBridge<T>(
  options: GlobalOptions,
  run: (host: BridgeHost) => Promise<T>,
): Promise<T | undefined> {
  const opened = openOrReport(options.config);
  if (!opened) {
    return undefined;
  }
  try {
    return await run(opened.host);
  } finally {
    await opened.host.stop();
  }
}

export function describeCredentialOutcome(outcome: CredentialCheckOutcome): {
  ok: boolean;
  text: string;
} {
  switch (outcome.status) {
    case "local-present":
      return { ok: true, text: "Credential already stored locally" };
    case "created":
      return { ok: true, text: `Created delegated credential ${outcome.remoteId}` };
    case "repaired":
      return {
        ok: true,
        text: `Replaced ${outcome.removed} orphaned credential(s) with ${outcome.remoteId}`,
      };
    case "in-progress":
      return { ok: false, text: "Another credential operation is in progress" };
    case "not-configured":
      return { ok: false, text: outcome.message };
    case "failed":
      return { ok: false, text: `Credential check failed: ${outcome.message}` };
  }
}

export function printOutcome(result: { ok: boolean; text: string }): void {
  if (result.ok) {
    console.log(pc.green(result.text));
    return;
  }
  console.error(pc.red(result.text));
  process.exitCode = 1;
}
