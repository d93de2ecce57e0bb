import { z } from "zod";
import { CatalogSchema } from "./catalog";
import { CredentialsSchema } from "./credentials";
import { LoggingSchema } from "./logging";
import { PathsSchema } from "./paths";
import { ProxySchema } from "./proxy";
import { StorageSchema } from "./storage";
import { TranslationSchema } from "./translation";
import { UpstreamSchema } from "./upstream";

export const BridgeConfigSchema = z
  .object({
    $schema: z.string().optional(),
    paths: PathsSchema.optional(),
    upstream: UpstreamSchema.optional(),
    proxy: ProxySchema.optional(),
    catalog: CatalogSchema.optional(),
    credentials: CredentialsSchema.optional(),
    translation: TranslationSchema.optional(),
    favorites: z.array(z.string().trim().min(1)).optional(),
    storage: StorageSchema.optional(),
    logging: LoggingSchema.optional(),
  })
  .strict();

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
