import { logger } from "../logger";
import type { ApiResult, RemoteCredentialSummary } from "../upstream";
import type { CredentialApi, CredentialCheckOutcome, CredentialStore } from "./types";
import { CredentialListCache } from "./list-cache";

export interface CredentialLifecycleOptions {
  api: CredentialApi;
  store: CredentialStore;
  label: string;
  listCacheTtlMs: number;
  limit?: number;
  now?: () => number;
}

type Failed = Extract<CredentialCheckOutcome, { status: "failed" }>;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Keeps exactly one delegated credential alive for this bridge.
 *
 * Every entry point runs one read-decide-act step under `guard`; a call that
 * arrives while another step is running returns `in-progress` and touches nothing.
 * Each step owns its own token, so a step abandoned by `resetCreationGuard` cannot
 * release the guard of the step that replaced it.
 */
export class CredentialLifecycleManager {
  private guard: symbol | null = null;
  private readonly listCache: CredentialListCache;

  constructor(private readonly options: CredentialLifecycleOptions) {
    this.listCache = new CredentialListCache(options.api, {
      ttlMs: options.listCacheTtlMs,
      now: options.now,
    });
  }

  get label(): string {
    return this.options.label;
  }

  isBusy(): boolean {
    return this.guard !== null;
  }

  /** Releases a guard left behind by an abandoned step. */
  resetCreationGuard(): void {
    if (this.guard) {
      logger.warn({ operation: this.guard.description }, "Credential creation guard reset");
    }
    this.guard = null;
  }

  async listRemote(force = false): Promise<ApiResult<RemoteCredentialSummary[]>> {
    return this.listCache.get(force);
  }

  invalidateListCache(): void {
    this.listCache.invalidate();
  }

  async ensureExists(options: { forceRefresh?: boolean } = {}): Promise<CredentialCheckOutcome> {
    return this.guarded("ensureExists", async () => {
      const local = await this.options.store.get();
      if (local) {
        return { status: "local-present" };
      }
      if (!this.options.api.hasProvisioningKey) {
        return {
          status: "not-configured",
          message: "No delegated credential stored and no provisioning key configured",
        };
      }

      const listing = await this.listCache.get(options.forceRefresh ?? false);
      if (!listing.ok) {
        return this.fail("listCredentials", listing.message);
      }

      const orphans = this.matching(listing.data);
      if (orphans.length === 0) {
        return this.create("created", 0);
      }

      logger.warn(
        { label: this.options.label, count: orphans.length },
        "Remote credential exists without a local value; recreating",
      );
      const removed = await this.deleteAll(orphans);
      if (typeof removed !== "number") {
        return removed;
      }
      return this.create("repaired", removed);
    });
  }

  /** Drops the local value and every remote credential with the label, then creates a fresh one. */
  async forceRecreate(): Promise<CredentialCheckOutcome> {
    return this.guarded("forceRecreate", async () => {
      if (!this.options.api.hasProvisioningKey) {
        return {
          status: "not-configured",
          message: "A provisioning key is required to recreate the delegated credential",
        };
      }

      const listing = await this.listCache.get(true);
      if (!listing.ok) {
        return this.fail("listCredentials", listing.message);
      }

      const removed = await this.deleteAll(this.matching(listing.data));
      if (typeof removed !== "number") {
        return removed;
      }
      await this.options.store.clear();
      return this.create(removed > 0 ? "repaired" : "created", removed);
    });
  }

  private matching(entries: RemoteCredentialSummary[]): RemoteCredentialSummary[] {
    return entries.filter((entry) => entry.name === this.options.label);
  }

  private async guarded(
    operation: string,
    step: () => Promise<CredentialCheckOutcome>,
  ): Promise<CredentialCheckOutcome> {
    if (this.guard) {
      logger.debug({ operation }, "Credential check already running; skipping");
      return { status: "in-progress" };
    }
    const token = Symbol(operation);
    this.guard = token;
    try {
      return await step();
    } catch (error) {
      return this.fail(operation, errorMessage(error));
    } finally {
      if (this.guard === token) {
        this.guard = null;
      }
    }
  }

  private async deleteAll(entries: RemoteCredentialSummary[]): Promise<number | Failed> {
    let removed = 0;
    for (const entry of entries) {
      const result = await this.options.api.deleteCredential(entry.remoteId);
      if (!result.ok) {
        this.listCache.invalidate();
        return this.fail("deleteCredential", result.message);
      }
      if (result.data.deleted) {
        removed += 1;
      }
    }
    if (entries.length > 0) {
      this.listCache.invalidate();
    }
    return removed;
  }

  private async create(
    status: "created" | "repaired",
    removed: number,
  ): Promise<CredentialCheckOutcome> {
    const result = await this.options.api.createCredential(this.options.label, this.options.limit);
    if (!result.ok) {
      return this.fail("createCredential", result.message);
    }
    this.listCache.invalidate();

    const { value, remoteId } = result.data;
    await this.options.store.set(value, { remoteId, label: this.options.label });
    await this.verifyPersisted(value, remoteId);

    logger.info({ remoteId, label: this.options.label, status }, "Delegated credential created");
    return status === "created" ? { status, remoteId } : { status, remoteId, removed };
  }

  private async verifyPersisted(expected: string, remoteId: string): Promise<void> {
    const stored = await this.options.store.get();
    if (stored !== expected) {
      logger.fatal(
        { remoteId, storedPresent: stored !== null },
        "Delegated credential read back from the store does not match the created value",
      );
    }
  }

  private fail(operation: string, message: string): Failed {
    logger.error({ operation, error: message }, "Credential lifecycle step failed");
    return { status: "failed", message };
  }
}
