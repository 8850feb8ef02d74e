import { mkdir, open, rename, unlink, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";

/**
 * Write JSON via a temporary sibling file, fsync, then rename over the target.
 * Readers see either the old document or the new one, never a partial write.
 */
export async function atomicWriteJson(path: string, data: unknown): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const tmp = `${path}.tmp.${process.pid}.${Date.now()}`;
  const payload = JSON.stringify(data, null, 2) + "\n";

  let fh: FileHandle | null = null;
  try {
    fh = await open(tmp, "w");
    await fh.writeFile(payload, "utf8");
    await fh.sync();
    await fh.close();
    fh = null;

    await rename(tmp, path);
  } catch (e) {
    if (fh) await fh.close().catch(() => undefined);
    await unlink(tmp).catch(() => undefined);
    throw e;
  }
}
