import type { ApiResult, RemoteCredentialSummary, RouterApi } from "../upstream";

type ListSource = Pick<RouterApi, "listCredentials">;

/** Short-lived cache of the remote credential listing. Only successful listings are kept. */
export class CredentialListCache {
  private entries: RemoteCredentialSummary[] | null = null;
  private fetchedAt = 0;
  private readonly now: () => number;

  constructor(
    private readonly source: ListSource,
    private readonly options: { ttlMs: number; now?: () => number },
  ) {
    this.now = options.now ?? Date.now;
  }

  isFresh(): boolean {
    return this.entries !== null && this.now() - this.fetchedAt < this.options.ttlMs;
  }

  async get(force = false): Promise<ApiResult<RemoteCredentialSummary[]>> {
    if (!force && this.entries !== null && this.isFresh()) {
      return { ok: true, status: 200, data: this.entries };
    }
    const result = await this.source.listCredentials();
    if (result.ok) {
      this.entries = result.data;
      this.fetchedAt = this.now();
    }
    return result;
  }

  invalidate(): void {
    this.entries = null;
    this.fetchedAt = 0;
  }
}
