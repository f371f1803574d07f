#!/usr/bin/env node
/**
 * CV-CUE CLI entry point
 */

import * as dotenv from "dotenv";
import { run } from "../lib/cli";

// Load environment variables
dotenv.config({ path: ".env.local" });
dotenv.config();

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("✗ Unexpected error:", error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
