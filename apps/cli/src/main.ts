#!/usr/bin/env tsx
import { asErrorMessage } from "@mirrorline/core";
import { createProgram } from "./program.js";

void createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(asErrorMessage(error));
    process.exitCode = 1;
  });
