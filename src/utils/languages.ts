import { z } from "zod";
import { loadDataFile } from "./data-files.js";

const languageTableSchema = z.object({
  extensions: z.record(z.string(), z.string()),
  filenames: z.record(z.string(), z.string()),
});

let _table: z.infer<typeof languageTableSchema> | null = null;

function table(): z.infer<typeof languageTableSchema> {
  _table ??= loadDataFile("languages.json", languageTableSchema);
  return _table;
}

/** Maps a file path to a language name by extension, or null when unknown. */
export function detectLanguage(filePath: string): string | null {
  const basename = (filePath.split("/").pop() ?? "").toLowerCase();
  if (!basename) return null;

  const byName = table().filenames[basename];
  if (byName) return byName;

  const dot = basename.lastIndexOf(".");
  if (dot < 0 || dot === basename.length - 1) return null;
  return table().extensions[basename.slice(dot + 1)] ?? null;
}
