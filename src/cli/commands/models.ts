import pc from "picocolors";
import { MODALITY_TAGS, supportsModality, type ModalityTag } from "../../catalog";
import { printOutcome, withBridge, type GlobalOptions } from "./shared";

export function parseModalityFilter(raw: string | undefined): ModalityTag | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const normalized = raw.trim().toLowerCase();
  const tag = MODALITY_TAGS.find((candidate) => candidate === normalized);
  if (!tag) {
    throw new Error(`Unknown modality "${raw}". Use one of: ${MODALITY_TAGS.join(", ")}.`);
  }
  return tag;
}

export async function modelsRefresh(options: GlobalOptions): Promise<void> {
  await withBridge(options, async (host) => {
    const outcome = await host.catalog.refresh(true);
    if (!outcome.ok) {
      printOutcome({ ok: false, text: `Catalog refresh failed: ${outcome.message}` });
      return;
    }
    printOutcome({ ok: true, text: `Loaded ${outcome.count} models` });
  });
}

export async function modelsList(options: GlobalOptions & { supports?: string }): Promise<void> {
  const filter = parseModalityFilter(options.supports);
  await withBridge(options, async (host) => {
    const outcome = await host.catalog.refresh();
    if (!outcome.ok) {
      printOutcome({ ok: false, text: `Catalog refresh failed: ${outcome.message}` });
      return;
    }
    const favorites = new Set(host.favorites.list());
    const models = host.catalog
      .list()
      .filter((model) => !filter || supportsModality(model.inputModalities, filter));
    for (const model of models) {
      const star = favorites.has(model.modelId) ? pc.yellow("*") : " ";
      console.log(
        `${star} ${model.modelId}  ${pc.dim(model.inputModalities.join(","))}`,
      );
    }
    console.log(pc.dim(`${models.length} models`));
  });
}
