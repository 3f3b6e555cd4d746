import "dotenv/config";
import { createLogger } from "@order-sim/shared/utils";
import { runCli } from "./cli.js";

const logger = createLogger("order-sim", { destination: 2 });

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2), { logger });
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "Simulator crashed");
  process.exit(1);
});
