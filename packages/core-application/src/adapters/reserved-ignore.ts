import path from "node:path";
import { isReservedName } from "@dirsnap/core-domain";

/** Ignore predicate for watched source trees. */
export function createSourceIgnore(rootDirs: string[]) {
  const roots = rootDirs.map((d) => path.resolve(d));

  return (absPath: string) => {
    const p = path.resolve(absPath);

    // only ignore inside a root
    const root = roots.find((r) => p === r || p.startsWith(r + path.sep));
    if (!root) return true;
    if (p === root) return false;

    const rel = path.relative(root, p);
    const segments = rel.split(path.sep);

    if (segments.some(isReservedName)) return true;

    // editor temporaries
    const base = segments[segments.length - 1] ?? "";
    if (base.endsWith("~")) return true;
    if (base.endsWith(".tmp")) return true;
    if (base.endsWith(".swp")) return true;
    if (base === ".DS_Store") return true;

    return false;
  };
}
