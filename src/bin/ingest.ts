#!/usr/bin/env node

import { PipelineFatalError } from "../utils/errors";
import { createProgram } from "./program";

async function main() {
  try {
    await createProgram().parseAsync(process.argv);
    process.exit(0);
  } catch (err: unknown) {
    const label = err instanceof PipelineFatalError ? "💥 Fatal pipeline error" : "💥 Command failed";
    console.error(`${label}:`, err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

void main();
