import "dotenv/config";
import { Command } from "commander";
import { registerConfig } from "./commands/config.js";
import { registerMigrate } from "./commands/migrate.js";
import { registerRun } from "./commands/run.js";

const program = new Command();

program
  .name("berthwatch")
  .description("Port operations KPI extraction into PostgreSQL")
  .version("0.1.0");

registerRun(program);
registerMigrate(program);
registerConfig(program);

await program.parseAsync();
