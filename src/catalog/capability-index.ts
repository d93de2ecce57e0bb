import { logger } from "../logger";
import type { ApiResult, ModelCapabilities } from "../upstream";

export interface ModelCatalogSource {
  listModels(): Promise<ApiResult<ModelCapabilities[]>>;
}

export type CatalogRefreshOutcome =
  | { ok: true; refreshed: boolean; count: number }
  | { ok: false; message: string };

interface CatalogSnapshot {
  models: ReadonlyMap<string, ModelCapabilities>;
  fetchedAt: number;
}

/**
 * TTL-bounded view of the upstream model catalog.
 *
 * A refresh swaps the whole snapshot, so readers see either the old catalog or the
 * new one. Once the TTL has passed every lookup is a miss until the next refresh.
 * After a failed fetch, unforced refreshes answer with that failure until
 * `retryBackoffMs` has passed.
 */
export class ModelCapabilityIndex {
  private snapshot: CatalogSnapshot | null = null;
  private refreshInFlight: Promise<CatalogRefreshOutcome> | null = null;
  private lastFailure: { at: number; message: string } | null = null;
  private readonly now: () => number;

  constructor(
    private readonly source: ModelCatalogSource,
    private readonly options: { ttlMs: number; retryBackoffMs?: number; now?: () => number },
  ) {
    this.now = options.now ?? Date.now;
  }

  isFresh(): boolean {
    return this.snapshot !== null && this.now() - this.snapshot.fetchedAt < this.options.ttlMs;
  }

  get(modelId: string): ModelCapabilities | undefined {
    if (!this.isFresh()) {
      return undefined;
    }
    return this.snapshot?.models.get(modelId);
  }

  list(): ModelCapabilities[] {
    if (!this.isFresh() || !this.snapshot) {
      return [];
    }
    return [...this.snapshot.models.values()];
  }

  get size(): number {
    return this.isFresh() ? (this.snapshot?.models.size ?? 0) : 0;
  }

  replace(models: readonly ModelCapabilities[]): void {
    this.snapshot = {
      models: new Map(models.map((model) => [model.modelId, model])),
      fetchedAt: this.now(),
    };
  }

  invalidate(): void {
    this.snapshot = null;
  }

  /** Fetches the catalog unless the current snapshot is still fresh. Concurrent callers share one fetch. */
  async refresh(force = false): Promise<CatalogRefreshOutcome> {
    if (!force && this.isFresh()) {
      return { ok: true, refreshed: false, count: this.size };
    }
    if (this.refreshInFlight) {
      return this.refreshInFlight;
    }
    if (!force && this.inBackoff()) {
      return { ok: false, message: this.lastFailure?.message ?? "Model catalog unavailable" };
    }

    const run = this.refreshInternal();
    this.refreshInFlight = run;
    return run.finally(() => {
      this.refreshInFlight = null;
    });
  }

  private inBackoff(): boolean {
    return (
      this.lastFailure !== null &&
      this.now() - this.lastFailure.at < (this.options.retryBackoffMs ?? 0)
    );
  }

  private async refreshInternal(): Promise<CatalogRefreshOutcome> {
    const result = await this.source.listModels();
    if (!result.ok) {
      logger.warn({ error: result.message, status: result.status }, "Model catalog refresh failed");
      this.lastFailure = { at: this.now(), message: result.message };
      return { ok: false, message: result.message };
    }
    this.replace(result.data);
    this.lastFailure = null;
    logger.debug({ count: result.data.length }, "Model catalog refreshed");
    return { ok: true, refreshed: true, count: result.data.length };
  }
}
