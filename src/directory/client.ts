import { DirectoryCache, type Notify } from "./cache.ts";
import { toNameMap, type Directory, type DirectoryEntry } from "./schema.ts";
import { SlackApiClient, type SlackApi } from "../slack/client.ts";
import { postSnippet } from "../slack/messages.ts";
import { fetchUserDirectory } from "../slack/users.ts";
import type { ShareConfig } from "../lib/config.ts";
import { CacheWriteError } from "../lib/errors.ts";

export type DirectoryClientOptions = {
  notice?: Notify;
  warn?: Notify;
};

/**
 * Cache-aside access to the workspace member directory, plus sending shared
 * snippets. The cache file is the only state kept between calls.
 */
export class DirectoryClient {
  private slack: SlackApi;
  private cache: DirectoryCache;
  private notice: Notify;
  private warn: Notify;

  constructor(input: { slack: SlackApi; cache: DirectoryCache } & DirectoryClientOptions) {
    this.slack = input.slack;
    this.cache = input.cache;
    this.notice = input.notice ?? (() => {});
    this.warn = input.warn ?? (() => {});
  }

  get cachePath(): string {
    return this.cache.path;
  }

  async getDirectory(forceRefresh = false): Promise<Directory> {
    if (!forceRefresh) {
      const cached = await this.cache.load();
      if (cached) {
        return cached;
      }
    }

    const directory = await this.fetchDirectory();
    try {
      await this.cache.save(directory);
    } catch (err: unknown) {
      if (!(err instanceof CacheWriteError)) {
        throw err;
      }
      this.warn(err.message);
    }
    return directory;
  }

  async getDirectoryByName(forceRefresh = false): Promise<Map<string, DirectoryEntry>> {
    return toNameMap(await this.getDirectory(forceRefresh));
  }

  async fetchDirectory(): Promise<Directory> {
    this.notice("Fetching users...");
    const directory = await fetchUserDirectory(this.slack);
    this.notice(`Fetched ${directory.length} users`);
    return directory;
  }

  async postMessage(content: string, recipientId: string): Promise<void> {
    await postSnippet(this.slack, { content, channel: recipientId });
    this.notice("Message sent");
  }

  clearCache(): Promise<void> {
    return this.cache.clear();
  }
}

export function createDirectoryClient(
  config: Pick<ShareConfig, "token" | "cachePath" | "apiUrl" | "debug">,
  options?: DirectoryClientOptions,
): DirectoryClient {
  return new DirectoryClient({
    slack: new SlackApiClient(config.token, { apiUrl: config.apiUrl, debug: config.debug }),
    cache: new DirectoryCache(config.cachePath, options),
    ...options,
  });
}
