import { logger } from "../logger";
import { favoriteModels } from "../storage/db";
import type { CapabilityLookup, FavoritesProvider } from "../proxy/capability-validator";
import type { ModelCapabilities } from "../upstream";

/** Ordered favorite model ids, persisted in SQLite. The order is the user's preference. */
export class FavoritesService implements FavoritesProvider {
  constructor(private readonly capabilities: CapabilityLookup) {}

  /** Seeds the list from config when nothing has been stored yet. */
  seed(modelIds: readonly string[]): boolean {
    if (modelIds.length === 0 || favoriteModels.count() > 0) {
      return false;
    }
    favoriteModels.replaceAll([...new Set(modelIds)]);
    logger.debug({ count: modelIds.length }, "Seeded favorite models from config");
    return true;
  }

  list(): string[] {
    return favoriteModels.list().map((row) => row.model_id);
  }

  isFavorite(modelId: string): boolean {
    return this.list().includes(modelId);
  }

  add(modelId: string): boolean {
    const id = modelId.trim();
    const current = this.list();
    if (!id || current.includes(id)) {
      return false;
    }
    favoriteModels.replaceAll([...current, id]);
    return true;
  }

  remove(modelId: string): boolean {
    const current = this.list();
    if (!current.includes(modelId)) {
      return false;
    }
    favoriteModels.replaceAll(current.filter((id) => id !== modelId));
    return true;
  }

  reorder(fromIndex: number, toIndex: number): boolean {
    const current = this.list();
    const inRange = (index: number) => Number.isInteger(index) && index >= 0 && index < current.length;
    if (!inRange(fromIndex) || !inRange(toIndex) || fromIndex === toIndex) {
      return false;
    }
    const [moved] = current.splice(fromIndex, 1);
    if (moved === undefined) {
      return false;
    }
    current.splice(toIndex, 0, moved);
    favoriteModels.replaceAll(current);
    return true;
  }

  clear(): void {
    favoriteModels.replaceAll([]);
  }

  getFavoriteModelIds(): string[] {
    return this.list();
  }

  getCachedModelById(modelId: string): ModelCapabilities | undefined {
    return this.capabilities.get(modelId);
  }
}
