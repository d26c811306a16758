import { Command } from "commander";
import { resolveCredentialSettings, revokeStoredCredentials } from "../google/auth.js";
import type { CliRuntime } from "../utils/runtime.js";
import { writeStderr } from "../utils/terminal.js";

export function logoutCommand(runtime: CliRuntime): Command {
  return new Command("logout")
    .description("Delete stored OAuth credentials (service account keys are not affected)")
    .action(async () => {
      const config = await runtime.configStore.load();
      const { credentialsPath } = resolveCredentialSettings(config);
      if (await revokeStoredCredentials(credentialsPath)) {
        writeStderr(`✓ Credentials deleted from ${credentialsPath}`);
        return;
      }
      writeStderr(`No credentials found at ${credentialsPath}`);
    });
}
