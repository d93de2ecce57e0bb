import { password } from "@inquirer/prompts";
import pc from "picocolors";
import { maskSecret } from "../../logger";
import {
  describeCredentialOutcome,
  printOutcome,
  withBridge,
  type GlobalOptions,
} from "./shared";

export async function credentialsStatus(options: GlobalOptions): Promise<void> {
  await withBridge(options, async (host) => {
    const value = await host.credentialStore.get();
    const provenance = await host.credentialStore.provenance();

    console.log(pc.bold("Delegated credential"));
    if (!value || !provenance) {
      console.log(`  stored: ${pc.red("no")}`);
    } else {
      console.log(`  stored: ${pc.green("yes")} ${pc.dim(maskSecret(value))}`);
      console.log(`  source: ${provenance.source}`);
      console.log(`  label: ${provenance.label}`);
      if (provenance.remoteId) {
        console.log(`  remote id: ${provenance.remoteId}`);
      }
      console.log(`  updated: ${provenance.updatedAt}`);
    }
    console.log(
      `  provisioning key: ${
        host.api.hasProvisioningKey ? pc.green("configured") : pc.yellow("not configured")
      }`,
    );
  });
}

export async function credentialsEnsure(
  options: GlobalOptions & { refresh?: boolean },
): Promise<void> {
  await withBridge(options, async (host) => {
    const outcome = await host.credentials.ensureExists({ forceRefresh: options.refresh });
    printOutcome(describeCredentialOutcome(outcome));
  });
}

export async function credentialsRecreate(options: GlobalOptions): Promise<void> {
  await withBridge(options, async (host) => {
    const outcome = await host.credentials.forceRecreate();
    printOutcome(describeCredentialOutcome(outcome));
  });
}

export async function credentialsList(options: GlobalOptions): Promise<void> {
  await withBridge(options, async (host) => {
    const listing = await host.credentials.listRemote(true);
    if (!listing.ok) {
      printOutcome({ ok: false, text: listing.message });
      return;
    }
    if (listing.data.length === 0) {
      console.log(pc.dim("No remote credentials."));
      return;
    }
    for (const entry of listing.data) {
      const owned = entry.name === host.credentials.label ? pc.cyan(" (bridge)") : "";
      const state = entry.disabled ? pc.red("disabled") : pc.green("active");
      const limit = entry.limit === null ? "no limit" : `limit ${entry.limit}`;
      console.log(
        `  ${entry.remoteId}  ${entry.name}${owned}  ${state}  usage ${entry.usage}, ${limit}`,
      );
    }
  });
}

export async function credentialsSet(options: GlobalOptions & { value?: string }): Promise<void> {
  const secret =
    options.value ??
    (await password({
      message: "Enter API key:",
      mask: "*",
      validate: (v) => (v.trim().length > 0 ? true : "Value is required"),
    }));

  if (secret.includes("\n") || secret.includes("\r")) {
    printOutcome({ ok: false, text: "Value must be a single line." });
    return;
  }

  await withBridge(options, async (host) => {
    await host.credentialStore.setManual(secret.trim());
    printOutcome({ ok: true, text: "Saved API key" });
  });
}

export async function credentialsClear(options: GlobalOptions): Promise<void> {
  await withBridge(options, async (host) => {
    const removed = await host.credentialStore.clear();
    if (!removed) {
      console.log(pc.yellow("No credential stored."));
      return;
    }
    console.log(pc.green("Removed local credential. The remote key is left untouched."));
  });
}
