import { readFileSync } from "fs";
import type { z } from "zod";

const DATA_DIR = new URL("../../data/", import.meta.url);

/** Reads and validates a JSON file from the repository's data/ directory. */
export function loadDataFile<S extends z.ZodTypeAny>(name: string, schema: S): z.infer<S> {
  const raw: unknown = JSON.parse(readFileSync(new URL(name, DATA_DIR), "utf-8"));
  return schema.parse(raw);
}
