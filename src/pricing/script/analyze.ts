#!/usr/bin/env node
// Load envs from .env
// npm run analyze -- 2024-01-01 2024-12-31
import "dotenv/config";
import { runCli } from "../application/cli";

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch(err => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
