import { Command } from "commander";
import { CONFIG_KEYS, setConfigValue, unsetConfigValue } from "../utils/configStore.js";
import type { CliRuntime } from "../utils/runtime.js";
import { writeJson, writeStderr } from "../utils/terminal.js";

export function configCommand(runtime: CliRuntime): Command {
  return new Command("config")
    .description("Manage configuration")
    .addCommand(showConfigCommand(runtime))
    .addCommand(setConfigCommand(runtime))
    .addCommand(unsetConfigCommand(runtime));
}

function showConfigCommand(runtime: CliRuntime): Command {
  return new Command("show").description("Show current configuration").action(async () => {
    writeJson(await runtime.configStore.load());
  });
}

function setConfigCommand(runtime: CliRuntime): Command {
  return new Command("set")
    .description(`Set a configuration value (${CONFIG_KEYS.join(", ")})`)
    .argument("<key>", "Configuration key")
    .argument("<value>", "Configuration value")
    .action(async (key: string, value: string) => {
      const store = runtime.configStore;
      const config = setConfigValue(await store.load(), key, value);
      await store.save(config);
      writeStderr(`✓ Set ${key}`);
    });
}

function unsetConfigCommand(runtime: CliRuntime): Command {
  return new Command("unset")
    .description("Remove a configuration value")
    .argument("<key>", "Configuration key")
    .action(async (key: string) => {
      const store = runtime.configStore;
      const { config, removed } = unsetConfigValue(await store.load(), key);
      if (!removed) {
        writeStderr(`No value found for ${key}`);
        return;
      }
      await store.save(config);
      writeStderr(`✓ Removed ${key}`);
    });
}
