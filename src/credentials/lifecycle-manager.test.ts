import { describe, expect, it, vi } from "vitest";
import type { ApiResult, CreatedCredential, RemoteCredentialSummary } from "../upstream";
import { CredentialLifecycleManager } from "./lifecycle-manager";
import type { CredentialApi, CredentialProvenance, CredentialStore } from "./types";

const LABEL = "IDE Assistant Bridge";

function summary(remoteId: string, name = LABEL): RemoteCredentialSummary {
  return {
    remoteId,
    name,
    label: `sk-${remoteId}`,
    limit: null,
    usage: 0,
    disabled: false,
    createdAt: "2026-01-01T00:00:00Z",
    updatedAt: null,
  };
}

class MemoryCredentialStore implements CredentialStore {
  value: string | null = null;
  origin: CredentialProvenance | null = null;
  failReads = false;

  async get(): Promise<string | null> {
    if (this.failReads) {
      throw new Error("store unavailable");
    }
    return this.value;
  }

  async set(value: string, origin: { remoteId?: string; label?: string } = {}): Promise<void> {
    this.value = value;
    this.origin = {
      remoteId: origin.remoteId,
      label: origin.label ?? LABEL,
      source: "created",
      updatedAt: "2026-01-01T00:00:00Z",
    };
  }

  async setManual(value: string): Promise<void> {
    this.value = value;
  }

  async clear(): Promise<boolean> {
    const had = this.value !== null;
    this.value = null;
    return had;
  }

  async provenance(): Promise<CredentialProvenance | null> {
    return this.origin;
  }
}

function createFakeApi(remote: RemoteCredentialSummary[] = []) {
  let created = 0;
  const listCredentials = vi.fn(
    async (): Promise<ApiResult<RemoteCredentialSummary[]>> => ({
      ok: true,
      status: 200,
      data: [...remote],
    }),
  );
  const createCredential = vi.fn(
    async (name: string, _limit?: number): Promise<ApiResult<CreatedCredential>> => {
      created += 1;
      const remoteId = `new-${created}`;
      const entry = summary(remoteId, name);
      remote.push(entry);
      return { ok: true, status: 200, data: { value: `test-secret-${created}`, remoteId, summary: entry } };
    },
  );
  const deleteCredential = vi.fn(
    async (remoteId: string): Promise<ApiResult<{ deleted: boolean }>> => {
      const index = remote.findIndex((entry) => entry.remoteId === remoteId);
      if (index >= 0) {
        remote.splice(index, 1);
      }
      return { ok: true, status: 200, data: { deleted: index >= 0 } };
    },
  );
  const api: CredentialApi = {
    hasProvisioningKey: true,
    listCredentials,
    createCredential,
    deleteCredential,
  };
  return { api, remote, listCredentials, createCredential, deleteCredential };
}

function createManager(api: CredentialApi, store: CredentialStore, now?: () => number) {
  return new CredentialLifecycleManager({ api, store, label: LABEL, listCacheTtlMs: 60_000, now });
}

describe("CredentialLifecycleManager", () => {
  it("does nothing when a local credential is present", async () => {
    const fake = createFakeApi([summary("old")]);
    const store = new MemoryCredentialStore();
    store.value = "test-secret";

    const outcome = await createManager(fake.api, store).ensureExists();

    expect(outcome).toEqual({ status: "local-present" });
    expect(fake.listCredentials).not.toHaveBeenCalled();
    expect(fake.createCredential).not.toHaveBeenCalled();
  });

  it("creates and persists a credential when none exists anywhere", async () => {
    const fake = createFakeApi();
    const store = new MemoryCredentialStore();

    const outcome = await createManager(fake.api, store).ensureExists();

    expect(outcome).toEqual({ status: "created", remoteId: "new-1" });
    expect(fake.createCredential).toHaveBeenCalledWith(LABEL, undefined);
    expect(store.value).toBe("test-secret-1");
    expect(store.origin?.remoteId).toBe("new-1");
  });

  it("creates exactly one credential for overlapping checks", async () => {
    const fake = createFakeApi();
    const store = new MemoryCredentialStore();
    const manager = createManager(fake.api, store);

    const [first, second] = await Promise.all([manager.ensureExists(), manager.ensureExists()]);

    expect(fake.createCredential).toHaveBeenCalledTimes(1);
    expect([first.status, second.status]).toEqual(["created", "in-progress"]);
    expect(manager.isBusy()).toBe(false);
  });

  it("repairs an orphaned remote credential by deleting then recreating it", async () => {
    const fake = createFakeApi([summary("orphan-1"), summary("unrelated", "Other tool")]);
    const store = new MemoryCredentialStore();

    const outcome = await createManager(fake.api, store).ensureExists();

    expect(outcome).toEqual({ status: "repaired", remoteId: "new-1", removed: 1 });
    expect(fake.deleteCredential).toHaveBeenCalledTimes(1);
    expect(fake.deleteCredential).toHaveBeenCalledWith("orphan-1");
    expect(fake.createCredential).toHaveBeenCalledTimes(1);
    expect(fake.deleteCredential.mock.invocationCallOrder[0]).toBeLessThan(
      fake.createCredential.mock.invocationCallOrder[0] ?? 0,
    );
    expect(await store.get()).toBe("test-secret-1");
  });

  it("deletes every duplicate labelled credential instead of adopting one", async () => {
    const fake = createFakeApi([summary("dup-1"), summary("dup-2")]);
    const store = new MemoryCredentialStore();

    const outcome = await createManager(fake.api, store).ensureExists();

    expect(outcome).toEqual({ status: "repaired", remoteId: "new-1", removed: 2 });
    expect(fake.deleteCredential.mock.calls.map(([remoteId]) => remoteId)).toEqual([
      "dup-1",
      "dup-2",
    ]);
    expect(fake.remote.map((entry) => entry.remoteId)).toEqual(["new-1"]);
  });

  it("reports a failed creation without retrying and releases the guard", async () => {
    const fake = createFakeApi();
    fake.createCredential.mockResolvedValueOnce({ ok: false, status: 500, message: "boom" });
    const store = new MemoryCredentialStore();
    const manager = createManager(fake.api, store);

    expect(await manager.ensureExists()).toEqual({ status: "failed", message: "boom" });
    expect(fake.createCredential).toHaveBeenCalledTimes(1);
    expect(manager.isBusy()).toBe(false);
    expect(store.value).toBeNull();

    expect(await manager.ensureExists()).toEqual({ status: "created", remoteId: "new-1" });
  });

  it("stops a repair at a failed delete without creating anything", async () => {
    const fake = createFakeApi([summary("orphan-1")]);
    fake.deleteCredential.mockResolvedValueOnce({ ok: false, status: 500, message: "delete refused" });
    const store = new MemoryCredentialStore();
    const manager = createManager(fake.api, store);

    expect(await manager.ensureExists()).toEqual({ status: "failed", message: "delete refused" });
    expect(fake.createCredential).not.toHaveBeenCalled();
    expect(store.value).toBeNull();
    expect(manager.isBusy()).toBe(false);
  });

  it("does not cache a failed listing", async () => {
    const fake = createFakeApi();
    fake.listCredentials.mockResolvedValueOnce({ ok: false, status: 502, message: "Bad Gateway" });
    const manager = createManager(fake.api, new MemoryCredentialStore());

    expect(await manager.ensureExists()).toEqual({ status: "failed", message: "Bad Gateway" });
    expect(fake.createCredential).not.toHaveBeenCalled();

    expect(await manager.ensureExists()).toEqual({ status: "created", remoteId: "new-1" });
    expect(fake.listCredentials).toHaveBeenCalledTimes(2);
  });

  it("turns store exceptions into a failed outcome", async () => {
    const fake = createFakeApi();
    const store = new MemoryCredentialStore();
    store.failReads = true;
    const manager = createManager(fake.api, store);

    expect(await manager.ensureExists()).toEqual({ status: "failed", message: "store unavailable" });
    expect(manager.isBusy()).toBe(false);
  });

  it("reports not-configured without a provisioning key", async () => {
    const fake = createFakeApi();
    const store = new MemoryCredentialStore();
    const manager = createManager({ ...fake.api, hasProvisioningKey: false }, store);

    const outcome = await manager.ensureExists();

    expect(outcome.status).toBe("not-configured");
    expect(fake.listCredentials).not.toHaveBeenCalled();
  });

  it("reuses the cached listing until forced or expired", async () => {
    let clock = 0;
    const fake = createFakeApi([summary("other", "Other tool")]);
    const manager = createManager(fake.api, new MemoryCredentialStore(), () => clock);

    await manager.listRemote();
    await manager.listRemote();
    expect(fake.listCredentials).toHaveBeenCalledTimes(1);

    await manager.listRemote(true);
    expect(fake.listCredentials).toHaveBeenCalledTimes(2);

    clock += 60_000;
    await manager.listRemote();
    expect(fake.listCredentials).toHaveBeenCalledTimes(3);
  });

  it("invalidates the cached listing after creating a credential", async () => {
    const fake = createFakeApi();
    const manager = createManager(fake.api, new MemoryCredentialStore());

    await manager.listRemote();
    await manager.ensureExists();
    const listing = await manager.listRemote();

    expect(fake.listCredentials).toHaveBeenCalledTimes(2);
    expect(listing.ok && listing.data.map((entry) => entry.remoteId)).toEqual(["new-1"]);
  });

  it("force-recreates even when a local credential exists", async () => {
    const fake = createFakeApi([summary("current")]);
    const store = new MemoryCredentialStore();
    store.value = "test-secret-old";

    const outcome = await createManager(fake.api, store).forceRecreate();

    expect(outcome).toEqual({ status: "repaired", remoteId: "new-1", removed: 1 });
    expect(store.value).toBe("test-secret-1");
  });

  it("keeps the local value when a forced recreate cannot delete", async () => {
    const fake = createFakeApi([summary("current")]);
    fake.deleteCredential.mockResolvedValueOnce({ ok: false, status: 500, message: "delete refused" });
    const store = new MemoryCredentialStore();
    store.value = "test-secret-old";

    const outcome = await createManager(fake.api, store).forceRecreate();

    expect(outcome).toEqual({ status: "failed", message: "delete refused" });
    expect(store.value).toBe("test-secret-old");
    expect(fake.createCredential).not.toHaveBeenCalled();
  });

  it("logs but does not fail when the read-back differs", async () => {
    const fake = createFakeApi();
    const store = new MemoryCredentialStore();
    const originalSet = store.set.bind(store);
    store.set = async (value, origin) => originalSet(`${value}-corrupted`, origin);

    const outcome = await createManager(fake.api, store).ensureExists();

    expect(outcome).toEqual({ status: "created", remoteId: "new-1" });
  });

  it("lets a stuck guard be reset", async () => {
    const fake = createFakeApi();
    let release: () => void = () => {};
    fake.listCredentials.mockImplementationOnce(
      () =>
        new Promise<ApiResult<RemoteCredentialSummary[]>>((resolve) => {
          release = () => resolve({ ok: true, status: 200, data: [] });
        }),
    );
    const manager = createManager(fake.api, new MemoryCredentialStore());

    const pending = manager.ensureExists();
    await vi.waitFor(() => expect(fake.listCredentials).toHaveBeenCalledTimes(1));
    expect(await manager.ensureExists()).toEqual({ status: "in-progress" });

    manager.resetCreationGuard();
    expect(manager.isBusy()).toBe(false);

    release();
    expect(await pending).toEqual({ status: "created", remoteId: "new-1" });
  });

  it("keeps the replacement step guarded after an abandoned step finishes", async () => {
    const fake = createFakeApi();
    const releases: Array<() => void> = [];
    const pendingListing = () =>
      new Promise<ApiResult<RemoteCredentialSummary[]>>((resolve) => {
        releases.push(() => resolve({ ok: true, status: 200, data: [] }));
      });
    fake.listCredentials.mockImplementationOnce(pendingListing).mockImplementationOnce(pendingListing);
    const manager = createManager(fake.api, new MemoryCredentialStore());

    const abandoned = manager.ensureExists();
    await vi.waitFor(() => expect(fake.listCredentials).toHaveBeenCalledTimes(1));
    manager.resetCreationGuard();
    const replacement = manager.forceRecreate();
    await vi.waitFor(() => expect(fake.listCredentials).toHaveBeenCalledTimes(2));

    releases[0]?.();
    expect(await abandoned).toEqual({ status: "created", remoteId: "new-1" });
    expect(manager.isBusy()).toBe(true);
    expect(await manager.ensureExists()).toEqual({ status: "in-progress" });

    releases[1]?.();
    expect(await replacement).toEqual({ status: "created", remoteId: "new-2" });
    expect(manager.isBusy()).toBe(false);
  });
});
