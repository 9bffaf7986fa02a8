import "dotenv/config";
import { runCli } from "./cli";
import * as logger from "@/logger";

async function main() {
  const exitCode = await runCli(process.argv.slice(2), {
    env: process.env,
    write: (line) => process.stdout.write(line + "\n"),
  });
  process.exitCode = exitCode;
}

main().catch((error: unknown) => {
  logger.error("Fatal error", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
