import type { Command } from "commander";
import type { CliContext } from "./context.ts";

export function registerCacheCommand(input: { program: Command; ctx: CliContext }): void {
  const cacheCmd = input.program.command("cache").description("Manage the cached member list");

  cacheCmd
    .command("update")
    .description("Fetch members from Slack and overwrite the cache")
    .action(async () => {
      try {
        const client = input.ctx.getDirectoryClient();
        const directory = await client.getDirectory(true);
        console.log(JSON.stringify({ saved: directory.length, path: client.cachePath }, null, 2));
      } catch (err: unknown) {
        console.error(input.ctx.errorMessage(err));
        process.exitCode = 1;
      }
    });

  cacheCmd
    .command("clear")
    .description("Delete the cache file")
    .action(async () => {
      try {
        const client = input.ctx.getDirectoryClient();
        await client.clearCache();
        console.log(JSON.stringify({ cleared: true, path: client.cachePath }, null, 2));
      } catch (err: unknown) {
        console.error(input.ctx.errorMessage(err));
        process.exitCode = 1;
      }
    });

  cacheCmd
    .command("path")
    .description("Print the cache file location")
    .action(() => {
      try {
        console.log(input.ctx.getConfig().cachePath);
      } catch (err: unknown) {
        console.error(input.ctx.errorMessage(err));
        process.exitCode = 1;
      }
    });
}
