#!/usr/bin/env node
import "dotenv/config";
import { readFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

import { errorMessage } from "./errors.js";
import { runPlayer } from "./player.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, "..", "package.json");
const packageJson = z.object({ version: z.string().optional() }).parse(JSON.parse(readFileSync(packageJsonPath, "utf-8")));
const VERSION = packageJson.version ?? "0.0.0";

runPlayer(process.env, { version: VERSION })
  .then((status) => {
    process.exit(status);
  })
  .catch((error) => {
    process.stderr.write(`Unexpected error: ${errorMessage(error)}\n`);
    process.exit(1);
  });
