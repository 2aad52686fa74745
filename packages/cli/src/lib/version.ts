import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const PackageVersionSchema = z.object({ version: z.string().min(1) });

export function resolvePackageRoot(fromUrl: string = import.meta.url): string {
  let dir = path.dirname(fileURLToPath(fromUrl));
  for (let i = 0; i < 5; i += 1) {
    if (fs.existsSync(path.join(dir, "package.json"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.dirname(fileURLToPath(fromUrl));
}

export function readCliVersion(rootDir: string = resolvePackageRoot()): string {
  const pkgPath = path.join(rootDir, "package.json");
  const parsed = PackageVersionSchema.safeParse(JSON.parse(fs.readFileSync(pkgPath, "utf8")));
  if (!parsed.success) throw new Error(`missing version in ${pkgPath}`);
  return parsed.data.version;
}
