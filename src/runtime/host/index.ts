import type { BridgeSettings } from "../../config";
import { ModelCapabilityIndex } from "../../catalog";
import {
  CredentialLifecycleManager,
  SqliteCredentialStore,
  type CredentialApi,
  type CredentialProvenance,
} from "../../credentials";
import { FavoritesService } from "../../favorites";
import { logger } from "../../logger";
import { BridgeServer, CapabilityValidator, RequestAcceptor, RequestTranslator } from "../../proxy";
import { closeDb } from "../../storage/db";
import { RouterApiClient, type RouterApi } from "../../upstream";

export type BridgeApi = RouterApi & CredentialApi;

export interface BridgeHostOptions {
  /** Replaces the HTTP client, mainly for tests. */
  api?: BridgeApi;
}

export interface BridgeStatus {
  running: boolean;
  startedAt: Date | null;
  port?: number;
  credential: CredentialProvenance | null;
  catalogModels: number;
  catalogFresh: boolean;
  favorites: string[];
}

/**
 * Wires the bridge together. The database must be initialized before construction.
 */
export class BridgeHost {
  readonly api: BridgeApi;
  readonly credentialStore: SqliteCredentialStore;
  readonly credentials: CredentialLifecycleManager;
  readonly catalog: ModelCapabilityIndex;
  readonly favorites: FavoritesService;
  private readonly server: BridgeServer;
  private startedAt: Date | null = null;

  constructor(
    readonly settings: BridgeSettings,
    options: BridgeHostOptions = {},
  ) {
    this.api = options.api ?? new RouterApiClient(settings.upstream);
    this.credentialStore = new SqliteCredentialStore(settings.storage.masterKeyEnv, {
      label: settings.credentials.label,
    });
    this.credentials = new CredentialLifecycleManager({
      api: this.api,
      store: this.credentialStore,
      label: settings.credentials.label,
      listCacheTtlMs: settings.credentials.listCacheTtlMs,
      limit: settings.credentials.limit,
    });
    this.catalog = new ModelCapabilityIndex(this.api, settings.catalog);
    this.favorites = new FavoritesService(this.catalog);
    this.favorites.seed(settings.favorites);

    const acceptor = new RequestAcceptor(
      new CapabilityValidator(this.catalog, this.favorites),
      new RequestTranslator(settings.translation),
      this.api,
    );
    this.server = new BridgeServer({
      acceptor,
      credentials: this.credentialStore,
      capabilities: this.catalog,
      favorites: this.favorites,
      options: settings.proxy,
    });
  }

  get isRunning(): boolean {
    return this.server.isRunning;
  }

  getPort(): number | undefined {
    return this.server.getPort();
  }

  async start(): Promise<void> {
    if (this.server.isRunning) {
      return;
    }

    const credential = await this.credentials.ensureExists();
    switch (credential.status) {
      case "failed":
        logger.warn({ error: credential.message }, "Delegated credential check failed");
        break;
      case "not-configured":
        logger.warn(credential.message);
        break;
      default:
        logger.info({ status: credential.status }, "Delegated credential ready");
    }

    const catalog = await this.catalog.refresh();
    if (!catalog.ok) {
      logger.warn({ error: catalog.message }, "Model catalog unavailable, capability checks skipped");
    } else {
      logger.info({ models: catalog.count }, "Model catalog loaded");
    }

    await this.server.start();
    this.startedAt = new Date();
  }

  async stop(): Promise<void> {
    await this.server.stop();
    this.startedAt = null;
    closeDb();
  }

  async status(): Promise<BridgeStatus> {
    return {
      running: this.server.isRunning,
      startedAt: this.startedAt,
      port: this.server.getPort(),
      credential: await this.credentialStore.provenance(),
      catalogModels: this.catalog.size,
      catalogFresh: this.catalog.isFresh(),
      favorites: this.favorites.list(),
    };
  }
}
