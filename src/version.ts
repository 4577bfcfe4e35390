/**
 * release-steward version - read from package.json
 */
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const PackageJsonSchema = z.object({ name: z.string().optional(), version: z.string() });

function findPackageJson(): { version: string } {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 10; i++) {
    const file = join(dir, "package.json");
    let content: string | undefined;
    try {
      content = readFileSync(file, "utf-8");
    } catch (error) {
      if (!(error instanceof Error && "code" in error && error.code === "ENOENT")) throw error;
    }
    if (content !== undefined) {
      const pkg = PackageJsonSchema.safeParse(JSON.parse(content));
      if (pkg.success && pkg.data.name === "release-steward") return pkg.data;
    }
    dir = dirname(dir);
  }
  return { version: "0.0.0" };
}

export const VERSION: string = findPackageJson().version;
