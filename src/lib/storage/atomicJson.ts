import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { z } from "zod";

import { StoreError } from "@/lib/errors";

let sequence = 0;

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Writes to a sibling temp file, then renames over the target. */
export async function writeJsonAtomic(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tempPath = `${path}.${process.pid}.${Date.now()}.${sequence++}.tmp`;
  try {
    await writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, "utf-8");
    await rename(tempPath, path);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}

/** Parsed file contents, or undefined when the file does not exist. */
export async function readJsonFile<T>(path: string, schema: z.ZodType<T>): Promise<T | undefined> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new StoreError("CORRUPT_FILE", `${path} is not valid JSON`, {
      path,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new StoreError("CORRUPT_FILE", `${path} does not match the expected shape`, {
      path,
      issues: parsed.error.issues.slice(0, 5).map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  return parsed.data;
}
