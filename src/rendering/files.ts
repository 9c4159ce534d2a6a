import { randomUUID } from "crypto";
import { mkdir, rename, rm, writeFile } from "fs/promises";
import path from "path";
import { IOError, errorMessage } from "../util/errors";

/**
 * Writes `data` next to `target` under a temporary name and renames it into
 * place, so readers never observe a partially written file.
 */
export async function writeFileAtomic(
  target: string,
  data: string | Uint8Array
): Promise<void> {
  const dir = path.dirname(target);
  try {
    await mkdir(dir, { recursive: true });
  } catch (err) {
    throw new IOError(`Cannot create output directory ${dir}: ${errorMessage(err)}`, {
      path: target,
    });
  }

  const temp = path.join(dir, `.${path.basename(target)}.${randomUUID()}.tmp`);
  try {
    await writeFile(temp, data);
    await rename(temp, target);
  } catch (err) {
    const cleanupError = await rm(temp, { force: true }).then(
      () => undefined,
      (rmErr: unknown) => errorMessage(rmErr)
    );
    throw new IOError(`Failed to write ${target}: ${errorMessage(err)}`, {
      path: target,
      ...(cleanupError ? { cleanupError } : {}),
    });
  }
}

/**
 * Appends `extension` unless the name already ends with it (case-insensitive).
 */
export function withExtension(filename: string, extension: string): string {
  return filename.toLowerCase().endsWith(extension)
    ? filename
    : `${filename}${extension}`;
}

/**
 * Replaces characters that are unsafe in file names on common filesystems.
 */
export function sanitizeFilename(value: string): string {
  return value
    .trim()
    .replace(/[<>:"/\\|?*\u0000-\u001f]/g, "_")
    .replace(/\s+/g, "_");
}
