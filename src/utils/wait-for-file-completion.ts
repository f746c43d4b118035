import { fileExists } from "./file-exists";
import { awaitCondition, type PollOptions } from "./await-condition";
import type { PendingFile, PollOutcome } from "../types/report";

/** Marker Firefox keeps next to a file while it is being written */
export const DEFAULT_MARKER_SUFFIX = ".part";

export function toPendingFile(
  path: string,
  markerSuffix: string = DEFAULT_MARKER_SUFFIX,
): PendingFile {
  return { path, markerPath: `${path}${markerSuffix}` };
}

/**
 * Wait until the writer of `path` has removed its partial-download marker
 *
 * A missing marker means the file is complete, including when no download
 * under that name ever started. Marker removal is the writer's signal only:
 * it says nothing about the integrity of the file content.
 */
export async function waitForFileCompletion(
  path: string,
  options: PollOptions & { markerSuffix?: string } = {},
): Promise<PollOutcome> {
  const { markerPath } = toPendingFile(path, options.markerSuffix);

  if (!(await fileExists(markerPath))) {
    return { status: "ready", elapsed: 0, attempts: 1 };
  }

  return awaitCondition(async () => !(await fileExists(markerPath)), options);
}
