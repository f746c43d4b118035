import { access } from "fs/promises";
import { constants } from "node:fs";

/**
 * Check if a file or directory exists
 * Only a missing path counts as absent; other errors (e.g. EACCES) are thrown
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}
