import type { Command } from "commander";
import type { CliContext } from "./context.ts";
import { redactToken } from "../lib/redact.ts";

export function registerConfigCommand(input: { program: Command; ctx: CliContext }): void {
  input.program
    .command("config")
    .description("Show the effective configuration (token redacted)")
    .action(() => {
      try {
        const config = input.ctx.getConfig();
        console.log(
          JSON.stringify({ ...config, token: redactToken(config.token) }, null, 2),
        );
      } catch (err: unknown) {
        console.error(input.ctx.errorMessage(err));
        process.exitCode = 1;
      }
    });
}
