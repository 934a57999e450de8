#!/usr/bin/env -S node --import tsx
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { runMain } from "citty";
import { config } from "dotenv";
import { main } from "./commands/index.js";

// Local .env for development; CI provides the environment directly
const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, "..", ".env") });

await runMain(main);
