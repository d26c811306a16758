#!/usr/bin/env node
import { getErrorMessage } from "@gdoc-editor/core";
import { runCli } from "./program.js";
import { writeStderr } from "./utils/terminal.js";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    writeStderr(getErrorMessage(error));
    process.exit(1);
  });
