import { rm, stat, writeFile } from "node:fs/promises";
import path from "node:path";

import { toError } from "../../utils/errorUtils.js";
import {
  FilesystemError,
  NotADirectoryError,
  PathNotSetError,
  UnsupportedNetworkPathError,
} from "../errors.js";

/** What `directoryOf` yields for an empty or relative-only setting. */
export const UNSET_PATH = ".";

const NETWORK_PREFIXES = ["nfs", "smb"] as const;
const MARKER_FILE = ".writable";

/**
 * Verifies `target` is an existing, writable, local directory by creating and
 * removing a marker file inside it.
 *
 * @throws PathNotSetError, UnsupportedNetworkPathError, NotADirectoryError or FilesystemError
 */
export async function checkWritable(target: string): Promise<void> {
  if (target === UNSET_PATH) {
    throw new PathNotSetError(target);
  }
  if (NETWORK_PREFIXES.some((prefix) => target.startsWith(prefix))) {
    throw new UnsupportedNetworkPathError(target);
  }

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(target)).isDirectory();
  } catch (error) {
    throw new FilesystemError(target, toError(error));
  }
  if (!isDirectory) {
    throw new NotADirectoryError(target);
  }

  const marker = path.join(target, MARKER_FILE);
  try {
    await writeFile(marker, "");
  } catch (error) {
    throw new FilesystemError(target, toError(error));
  }
  try {
    await rm(marker, { force: true });
  } catch (error) {
    throw new FilesystemError(target, toError(error));
  }
}
