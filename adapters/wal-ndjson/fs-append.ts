import { promises as fsp } from "fs";
import type { FileHandle } from "fs/promises";

export type Handle = FileHandle;

/** Append text and wait until the file content reaches the disk. */
export async function appendAndFsync(handle: Handle, content: string): Promise<void> {
  await handle.appendFile(content, { encoding: "utf8" });
  await handle.datasync();
}

/** Replace `path` so readers see either the old or the new content, never a mix. */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const tmp = `${path}.tmp`;
  const handle = await fsp.open(tmp, "w");
  try {
    await handle.writeFile(content, { encoding: "utf8" });
    await handle.sync();
  } finally {
    await handle.close();
  }
  await fsp.rename(tmp, path);
}

export function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
