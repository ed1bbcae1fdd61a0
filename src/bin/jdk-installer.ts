#!/usr/bin/env node
/**
 * Executable entry point for `jdk-installer`.
 */

import { main } from "../cli.js";

main(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
