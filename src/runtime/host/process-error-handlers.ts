import { logger } from "../../logger";

declare global {
  // eslint-disable-next-line no-var
  var __routerBridgeProcessErrorHandlersRegistered: boolean | undefined;
}

function describeError(error: unknown): string {
  return error instanceof Error ? (error.stack ?? error.message) : String(error);
}

export function registerProcessErrorHandlers(): void {
  if (globalThis.__routerBridgeProcessErrorHandlersRegistered) {
    return;
  }
  globalThis.__routerBridgeProcessErrorHandlersRegistered = true;

  process.on("unhandledRejection", (reason) => {
    logger.error({ error: describeError(reason) }, "Unhandled rejection");
  });

  process.on("uncaughtException", (error) => {
    logger.fatal({ error: describeError(error) }, "Uncaught exception");
    process.exitCode = 1;
  });
}
