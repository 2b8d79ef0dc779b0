#!/usr/bin/env node
import "dotenv/config";

import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { authorize } from "./spotifyClient.js";

async function runAuth(): Promise<void> {
  const config = loadConfig();
  await authorize(config);
  process.stdout.write(`Authentication complete. Tokens stored at ${config.tokenPath}.\n`);
}

runAuth().catch((error) => {
  process.stderr.write(`Authentication failed: ${errorMessage(error)}\n`);
  process.exitCode = 1;
});
