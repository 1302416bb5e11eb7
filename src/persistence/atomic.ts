import { mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { StoreError } from "../errors.js";

/** Write to a temporary sibling, then rename over `filePath`. */
export async function atomicWrite(filePath: string, data: string): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, data, { encoding: "utf8" });
  } catch (err) {
    throw new StoreError("STORE_IO", `Atomic write failed: ${filePath}`, { cause: err });
  }
}

export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  await atomicWrite(filePath, JSON.stringify(data, null, 2) + "\n");
}

/** Read a file, or null if it does not exist. */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw new StoreError("STORE_IO", `Failed to read: ${filePath}`, { cause: err });
  }
}
