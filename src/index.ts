#!/usr/bin/env -S npx tsx
import { Command } from "commander";
import { createCliContext } from "./cli/context.ts";
import { registerCacheCommand } from "./cli/cache-command.ts";
import { registerConfigCommand } from "./cli/config-command.ts";
import { registerShareCommand } from "./cli/share-command.ts";
import { registerUserCommand } from "./cli/user-command.ts";
import { APP_NAME } from "./lib/app-dir.ts";
import { getPackageVersion } from "./lib/version.ts";

const program = new Command();
program
  .name(APP_NAME)
  .description("Share text snippets with Slack members and channels")
  .version(getPackageVersion());

const ctx = createCliContext();
registerShareCommand({ program, ctx });
registerUserCommand({ program, ctx });
registerCacheCommand({ program, ctx });
registerConfigCommand({ program, ctx });

if (process.argv.slice(2).length === 0) {
  program.outputHelp();
} else {
  await program.parseAsync(process.argv);
}
