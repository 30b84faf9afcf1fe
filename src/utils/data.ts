import { readFileSync } from "fs";
import type { z } from "zod";

/**
 * Loads and validates a JSON file from the top-level data/ directory. The
 * path resolves the same from src/utils and from the compiled dist/utils.
 */
export function readDataFile<T>(
  name: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  const url = new URL(`../../data/${name}`, import.meta.url);
  return schema.parse(JSON.parse(readFileSync(url, "utf-8")));
}
