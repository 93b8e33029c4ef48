import path from "node:path";

export function isHiddenName(name: string): boolean {
  return name.startsWith(".");
}

/** True for anything outside `rootDir` or under a hidden file or directory. */
export function createHiddenPathIgnore(rootDir: string) {
  const root = path.resolve(rootDir);

  return (absPath: string) => {
    const p = path.resolve(absPath);
    if (p === root) return false;

    const rel = path.relative(root, p);
    if (rel.startsWith("..") || path.isAbsolute(rel)) return true;

    return rel.split(path.sep).some(isHiddenName);
  };
}
