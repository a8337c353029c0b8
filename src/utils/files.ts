import { mkdir, readdir, rename, rm, stat, writeFile } from "fs/promises";
import path from "path";

let tempCounter = 0;

/**
 * Writes a file so readers only ever see the old or the new content: the data goes
 * to a sibling temp file first, which is then renamed over the target.
 * @param target - Final path of the file
 * @param data - File contents
 */
export async function writeFileAtomic(
  target: string,
  data: string | Uint8Array
): Promise<void> {
  await mkdir(path.dirname(target), { recursive: true });

  tempCounter += 1;
  const tempPath = `${target}.${process.pid}.${tempCounter}.tmp`;

  try {
    await writeFile(tempPath, data);
    await rename(tempPath, target);
  } catch (err) {
    await rm(tempPath, { force: true });
    throw err;
  }
}

/**
 * @returns The size in bytes, or null when nothing exists at the path
 */
export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const info = await stat(filePath);
    return info.isFile() ? info.size : null;
  } catch (err: unknown) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (err: unknown) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Makes an id usable as a single path segment or object-key segment */
export function safeSegment(id: string): string {
  return id.replace(/[\\/]/g, "_").replace(/^\.+$/, "_");
}

/**
 * Deletes every `{basename}.*` file directly inside `dir`.
 * @returns Names of the removed files
 */
export async function removeMatching(dir: string, basename: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err: unknown) {
    if (isNotFound(err)) return [];
    throw err;
  }

  const stale = names.filter((name) => name.startsWith(`${basename}.`));
  await Promise.all(stale.map((name) => rm(path.join(dir, name), { force: true })));
  return stale;
}
