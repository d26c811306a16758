import type { EditOptions } from "@gdoc-editor/core";
import type { Command } from "commander";

export type EditFlags = {
  force?: boolean;
  dryRun?: boolean;
  revision?: string;
};

export function withEditOptions(command: Command): Command {
  return command
    .option("--force", "Skip the revision safety check")
    .option("--dry-run", "Preview the requests without executing them")
    .option("--revision <revisionId>", "Require this revision, e.g. the revisionId from an earlier read");
}

export function toEditOptions(flags: EditFlags): EditOptions {
  return {
    force: flags.force === true,
    dryRun: flags.dryRun === true,
    ...(flags.revision ? { revision: flags.revision } : {}),
  };
}
