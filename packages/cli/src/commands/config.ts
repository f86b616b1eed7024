import { isBerthwatchError } from "@berthwatch/shared/errors";
import type { Command } from "commander";
import { loadConfig, redactConfig } from "../util/config.js";
import { error } from "../util/output.js";

export function registerConfig(program: Command): void {
  program
    .command("config")
    .description("Print the resolved configuration with secrets masked")
    .action(() => {
      try {
        console.log(JSON.stringify(redactConfig(loadConfig()), null, 2));
      } catch (err) {
        error(isBerthwatchError(err) ? `${err.code} ${err.message}` : String(err));
        process.exitCode = 1;
      }
    });
}
