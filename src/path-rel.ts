// src/path-rel.ts
import path from "node:path";

// Relative paths are the identity shared by the three trees; always "/"-separated.
export function toRel(abs: string, root: string): string {
  if (abs === root) return "";
  const rel = path.relative(root, abs);
  return rel.split(path.sep).join("/");
}

export function toAbs(rel: string, root: string): string {
  return rel ? path.join(root, ...rel.split("/")) : root;
}
