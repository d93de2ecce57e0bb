import { runStart } from "./cli/commands/start";
import { logger } from "./logger";

async function main() {
  const args = process.argv.slice(2);
  const configArgIndex = args.indexOf("--config");
  const configPath = configArgIndex >= 0 ? args[configArgIndex + 1] : undefined;

  await runStart({ config: configPath });
}

main().catch((err) => {
  logger.error({ err }, "Fatal error during startup");
  process.exit(1);
});
