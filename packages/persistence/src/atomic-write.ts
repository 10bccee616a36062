import fs from "node:fs/promises";
import path from "node:path";
import { getLogger } from "@agenda/core";

const log = getLogger("atomic-write");

/** The subset of `node:fs/promises` the schedule store touches. */
export interface StoreFileSystem {
  readFile(filePath: string, encoding: "utf8"): Promise<string>;
  writeFile(filePath: string, data: string, encoding: "utf8"): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  mkdir(dirPath: string, options: { recursive: true }): Promise<string | undefined>;
  rm(filePath: string, options: { force: true }): Promise<void>;
}

export const nodeFileSystem: StoreFileSystem = fs;

/**
 * Writes a file atomically by renaming a temp file into place.
 * Expects: payload is fully serialized. Creates the parent directory.
 * The target is only ever replaced whole; a failed rename leaves it as it was.
 */
export async function atomicWrite(
  filePath: string,
  payload: string,
  fileSystem: StoreFileSystem = nodeFileSystem,
): Promise<void> {
  await fileSystem.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.tmp-${process.pid}-${Date.now()}`;
  await fileSystem.writeFile(tempPath, payload, "utf8");
  try {
    await fileSystem.rename(tempPath, filePath);
  } catch (err) {
    await fileSystem.rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
      log.warn({ err: cleanupErr, tempPath }, "Failed to remove temp file");
    });
    throw err;
  }
}
