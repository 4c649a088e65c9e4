import type { Notify } from "../directory/cache.ts";
import { createDirectoryClient, type DirectoryClient } from "../directory/client.ts";
import { loadConfig, type ShareConfig } from "../lib/config.ts";
import { errorMessage } from "../lib/errors.ts";

export type CliContext = {
  getConfig: () => ShareConfig;
  getDirectoryClient: () => DirectoryClient;
  /** Whether reads should skip the cache, from `--no-cache` or the environment. */
  shouldRefresh: (options: { cache?: boolean; refresh?: boolean }) => boolean;
  errorMessage: (err: unknown) => string;
};

export function createCliContext(input?: {
  env?: NodeJS.ProcessEnv;
  stderr?: { write: (chunk: string) => unknown };
}): CliContext {
  const env = input?.env ?? process.env;
  const stderr = input?.stderr ?? process.stderr;

  const notice: Notify = (message) => {
    stderr.write(`${message}\n`);
  };
  const warn: Notify = (message) => {
    stderr.write(`warning: ${message}\n`);
  };

  let config: ShareConfig | undefined;
  const getConfig = (): ShareConfig => {
    config ??= loadConfig(env);
    return config;
  };

  let client: DirectoryClient | undefined;
  const getDirectoryClient = (): DirectoryClient => {
    client ??= createDirectoryClient(getConfig(), { notice, warn });
    return client;
  };

  const shouldRefresh = (options: { cache?: boolean; refresh?: boolean }): boolean =>
    Boolean(options.refresh) || options.cache === false || getConfig().noCache;

  return {
    getConfig,
    getDirectoryClient,
    shouldRefresh,
    errorMessage,
  };
}
