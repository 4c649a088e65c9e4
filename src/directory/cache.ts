import { DirectorySchema, type Directory } from "./schema.ts";
import { errorMessage, CacheWriteError } from "../lib/errors.ts";
import { readTextFile, removeFile, writeJsonFileAtomic } from "../lib/fs.ts";

export type Notify = (message: string) => void;

export type DirectoryCacheOptions = {
  /** Progress notices, such as a missing cache file. */
  notice?: Notify;
  /** Problems that were recovered from, such as a corrupt cache file. */
  warn?: Notify;
};

const noop: Notify = () => {};

/**
 * Keeps the last-known Directory in a single JSON file. Anything that is not a
 * valid Directory on disk reads back as a cache miss.
 */
export class DirectoryCache {
  readonly path: string;
  private notice: Notify;
  private warn: Notify;
  private pendingWrite: Promise<void> = Promise.resolve();

  constructor(path: string, options?: DirectoryCacheOptions) {
    this.path = path;
    this.notice = options?.notice ?? noop;
    this.warn = options?.warn ?? noop;
  }

  async load(): Promise<Directory | null> {
    let raw: string | null;
    try {
      raw = await readTextFile(this.path);
    } catch (err: unknown) {
      this.warn(`cache file is unreadable (${errorMessage(err)})`);
      return null;
    }

    if (raw === null) {
      this.notice("no cache file found");
      return null;
    }
    if (raw.trim() === "") {
      this.warn("cache file is empty");
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      this.warn(`cache file ${this.path} is corrupt; ignoring it`);
      return null;
    }

    const parsed = DirectorySchema.safeParse(data);
    if (!parsed.success) {
      this.warn(`cache file ${this.path} does not hold a user list; ignoring it`);
      return null;
    }
    return parsed.data;
  }

  save(directory: Directory): Promise<void> {
    const entries = directory.map(({ id, team, name }) => ({ id, team, name }));
    const write = this.pendingWrite.then(async () => {
      try {
        await writeJsonFileAtomic(this.path, entries);
      } catch (err: unknown) {
        throw new CacheWriteError(this.path, err);
      }
    });
    // Later saves queue behind this one whether it succeeds or not.
    this.pendingWrite = write.catch(() => undefined);
    return write;
  }

  async clear(): Promise<void> {
    await this.pendingWrite;
    try {
      await removeFile(this.path);
    } catch (err: unknown) {
      throw new CacheWriteError(this.path, err);
    }
  }
}
