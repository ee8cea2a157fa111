#!/usr/bin/env node
import "dotenv/config";
import packageJson from "../package.json";
import { createProgram, type CliOutput } from "./cli/program";
import { LOG_LEVEL_ENV } from "./config";
import { logger, parseLogLevel, setLogLevel } from "./utils/logger";

async function main() {
  const envLevel = parseLogLevel(process.env[LOG_LEVEL_ENV]);
  if (envLevel !== undefined) {
    setLogLevel(envLevel);
  }

  const output: CliOutput = {
    write: (text) => console.log(text),
    exitCode: 0,
  };

  try {
    await createProgram(packageJson.version, output).parseAsync();
  } catch (error) {
    logger.error(`❌ Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
  process.exit(output.exitCode);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
