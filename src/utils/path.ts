import path from "node:path";

export function toPosix(p: string): string {
  return p.split(path.sep).join("/");
}

export function isUnderDir(filePath: string, dirPath: string): boolean {
  const rel = path.relative(dirPath, filePath);
  return !!rel && !rel.startsWith("..") && !path.isAbsolute(rel);
}

export function isSameOrUnderDir(filePath: string, dirPath: string): boolean {
  return path.resolve(filePath) === path.resolve(dirPath) || isUnderDir(filePath, dirPath);
}

/** Code-unit ordering; unlike localeCompare it does not depend on the host locale. */
export function comparePaths(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
