#!/usr/bin/env tsx
/**
 * CLI: feedseeker
 *
 * Usage:
 *   feedseeker https://news.example.com -c Technology
 *   feedseeker https://blog.example.com -c Blogs --single-url-mode --debug
 *   feedseeker serve --port 8080
 */

import { createProgram } from "./program";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error("❌", error instanceof Error ? error.message : error);
    process.exit(1);
  });
