import { copyFile, rename, unlink } from "fs/promises";

/**
 * Move a file, replacing whatever file already sits at `destination`
 * Falls back to copy + unlink when source and destination are on different
 * devices
 */
export async function moveFile(
  source: string,
  destination: string,
): Promise<void> {
  try {
    await rename(source, destination);
  } catch (error) {
    if (!(error instanceof Error && "code" in error && error.code === "EXDEV")) {
      throw error;
    }
    await copyFile(source, destination);
    await unlink(source);
  }
}
