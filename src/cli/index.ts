#!/usr/bin/env node

import { CommanderError } from "commander";

import { isListingError } from "../core/index.js";
import { exitCodeForError, runCli } from "./cli.js";

runCli().catch((error: unknown) => {
  // commander already printed its own usage errors
  if (!(error instanceof CommanderError)) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(
      isListingError(error) ? `Error fetching repositories list: ${message}` : message,
    );
  }
  process.exitCode = exitCodeForError(error);
});
