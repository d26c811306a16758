import { Command, CommanderError } from "commander";
import { batchCommand } from "./commands/batch.js";
import { configCommand } from "./commands/config.js";
import { deleteCommand } from "./commands/delete.js";
import { findCommand } from "./commands/find.js";
import { insertCommand } from "./commands/insert.js";
import { logoutCommand } from "./commands/logout.js";
import { markdownCommand } from "./commands/markdown.js";
import { readCommand } from "./commands/read.js";
import { replaceCommand } from "./commands/replace.js";
import { type CliRuntime, createDefaultRuntime } from "./utils/runtime.js";
import { writeError } from "./utils/terminal.js";

export const CLI_VERSION = "0.1.0";

const WORKFLOW_HELP = `
Workflow:
  1. Read the document to get its structure and indices
  2. Find a section or work out the target indices
  3. Insert, delete or replace at those indices
  4. Re-read before further edits; indices shift after every write

Edits fail when the document changed since the revision they were computed
against. Pass --force to skip the check or --revision to pin an earlier read.`;

export function createProgram(runtime: CliRuntime): Command {
  const program = new Command();

  program
    .name("gdoc-cli")
    .description("Read and edit Google Docs by UTF-16 index")
    .version(CLI_VERSION)
    .addHelpText("after", WORKFLOW_HELP);

  program.addCommand(readCommand(runtime));
  program.addCommand(findCommand(runtime));
  program.addCommand(insertCommand(runtime));
  program.addCommand(deleteCommand(runtime));
  program.addCommand(replaceCommand(runtime));
  program.addCommand(batchCommand(runtime));
  program.addCommand(markdownCommand(runtime));
  program.addCommand(logoutCommand(runtime));
  program.addCommand(configCommand(runtime));

  return program;
}

/** Runs one invocation and resolves with the process exit code. */
export async function runCli(
  argv: readonly string[],
  runtime: CliRuntime = createDefaultRuntime()
): Promise<number> {
  const program = createProgram(runtime);
  throwInsteadOfExit(program);
  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already printed usage or help
      return error.exitCode;
    }
    writeError(error);
    return 1;
  }
}

function throwInsteadOfExit(command: Command): void {
  command.exitOverride();
  for (const child of command.commands) {
    throwInsteadOfExit(child);
  }
}
