import { loadConfig } from "./src/app/config";
import { runPoseFilter } from "./src/app/App";
import { logger } from "./src/infra/logger/logger";

async function main() {
  const { svg } = await runPoseFilter(loadConfig());
  process.stdout.write(`${svg}\n`);
}

main().catch((e: unknown) => {
  logger.error("pose filter run failed", { error: e });
  process.exitCode = 1;
});
