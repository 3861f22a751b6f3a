/**
 * Version metadata: single source for releases and the on-disk schema.
 * Package version is read from package.json (found next to this file, or one level up when built into dist/).
 */

import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

function readPackageVersion(): string {
  for (const rel of ["./package.json", "../package.json"]) {
    const path = fileURLToPath(new URL(rel, import.meta.url));
    if (!existsSync(path)) continue;
    const pkg: unknown = JSON.parse(readFileSync(path, "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  }
  return "0.0.0";
}

/** Package release version (from package.json). */
export const packageVersion: string = readPackageVersion();

/** Schema version for the SQLite/LanceDB layout, recorded in store_meta. Bump on breaking schema changes. */
export const schemaVersion = 1;

export const versionInfo = {
  packageVersion,
  schemaVersion,
} as const;

export default versionInfo;
