import pc from "picocolors";
import { printOutcome, withBridge, type GlobalOptions } from "./shared";

export async function favoritesList(options: GlobalOptions): Promise<void> {
  await withBridge(options, async (host) => {
    const favorites = host.favorites.list();
    if (favorites.length === 0) {
      console.log(pc.dim("No favorite models. /v1/models lists the whole catalog."));
      return;
    }
    favorites.forEach((modelId, index) => {
      console.log(`  ${index + 1}. ${modelId}`);
    });
  });
}

export async function favoritesAdd(modelId: string, options: GlobalOptions): Promise<void> {
  await withBridge(options, async (host) => {
    const catalog = await host.catalog.refresh();
    if (catalog.ok && !host.catalog.get(modelId)) {
      console.log(pc.yellow(`${modelId} is not in the current catalog`));
    }
    if (!host.favorites.add(modelId)) {
      printOutcome({ ok: false, text: `${modelId} is already a favorite` });
      return;
    }
    printOutcome({ ok: true, text: `Added ${modelId}` });
  });
}

export async function favoritesRemove(modelId: string, options: GlobalOptions): Promise<void> {
  await withBridge(options, async (host) => {
    if (!host.favorites.remove(modelId)) {
      printOutcome({ ok: false, text: `${modelId} is not a favorite` });
      return;
    }
    printOutcome({ ok: true, text: `Removed ${modelId}` });
  });
}

/** Positions are 1-based, as printed by `favorites list`. */
export async function favoritesMove(
  from: string,
  to: string,
  options: GlobalOptions,
): Promise<void> {
  await withBridge(options, async (host) => {
    if (!host.favorites.reorder(Number(from) - 1, Number(to) - 1)) {
      printOutcome({ ok: false, text: `Cannot move favorite ${from} to ${to}` });
      return;
    }
    printOutcome({ ok: true, text: `Moved favorite ${from} to ${to}` });
  });
}
