import pc from "picocolors";
import { logger } from "../../logger";
import { registerProcessErrorHandlers } from "../../runtime/host/process-error-handlers";
import { BridgeConfigError, openBridge, type OpenedBridge } from "../../runtime/host/bootstrap";
import { APP_VERSION } from "../../version";
import type { GlobalOptions } from "./shared";

function openOrExit(configPath?: string): OpenedBridge {
  try {
    return openBridge(configPath);
  } catch (error) {
    if (error instanceof BridgeConfigError) {
      logger.error({ errors: error.errors, path: error.configPath }, "Failed to load configuration");
      process.exit(1);
    }
    throw error;
  }
}

/** Runs the bridge in the foreground until SIGINT or SIGTERM. */
export async function runStart(options: GlobalOptions): Promise<void> {
  registerProcessErrorHandlers();
  const { host, configPath } = openOrExit(options.config);
  const { settings } = host;

  logger.info(`
=========================================
   Router Bridge v${APP_VERSION}
=========================================
   Config: ${configPath}
   Upstream: ${settings.upstream.baseUrl}
   Listen: ${settings.proxy.host}:${settings.proxy.port}
   Favorites: ${settings.favorites.length}
=========================================
  `);

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await host.stop();
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  await host.start();
  console.log(pc.green(`Bridge listening on http://${settings.proxy.host}:${host.getPort()}/v1`));
}
