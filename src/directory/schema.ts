import { z } from "zod";

export const DirectoryEntrySchema = z.object({
  id: z.string().min(1),
  team: z.string(),
  name: z.string(),
});

export type DirectoryEntry = z.infer<typeof DirectoryEntrySchema>;

export const DirectorySchema = z.array(DirectoryEntrySchema);

export type Directory = DirectoryEntry[];

/** Name-keyed view of a Directory. Later entries win when names collide. */
export function toNameMap(directory: Directory): Map<string, DirectoryEntry> {
  const map = new Map<string, DirectoryEntry>();
  for (const entry of directory) {
    map.set(entry.name, entry);
  }
  return map;
}
