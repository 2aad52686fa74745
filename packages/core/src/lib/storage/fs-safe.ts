import fs from "node:fs/promises";
import path from "node:path";

function errnoCode(err: unknown): string {
  if (typeof err !== "object" || err === null || !("code" in err)) return "";
  const code: unknown = err.code;
  return typeof code === "string" ? code : "";
}

export function isMissingPathError(err: unknown): boolean {
  const code = errnoCode(err);
  return code === "ENOENT" || code === "ENOTDIR";
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.stat(p);
    return true;
  } catch (err) {
    if (isMissingPathError(err)) return false;
    throw err;
  }
}

export async function readTextIfExists(p: string): Promise<string | null> {
  try {
    return await fs.readFile(p, "utf8");
  } catch (err) {
    if (isMissingPathError(err)) return null;
    throw err;
  }
}

async function fsyncDirectory(dir: string): Promise<void> {
  const handle = await fs.open(dir, "r");
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

async function removeQuietly(p: string): Promise<void> {
  await fs.rm(p, { force: true });
}

/** Write via temp file + rename so readers see either the old or the new contents, never a mix. */
export async function writeFileAtomic(
  filePath: string,
  contents: string,
  opts: { mode?: number } = {},
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const mode = opts.mode ?? 0o600;
  const tmp = path.join(dir, `.${path.basename(filePath)}.tmp.${process.pid}.${Date.now()}`);
  let tmpCreated = false;
  try {
    const handle = await fs.open(tmp, "w", mode);
    tmpCreated = true;
    try {
      await handle.writeFile(contents, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.chmod(tmp, mode);
    await fs.rename(tmp, filePath);
    tmpCreated = false;
    await fsyncDirectory(dir);
  } finally {
    if (tmpCreated) await removeQuietly(tmp);
  }
}
