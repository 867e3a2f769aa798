import * as walk from "@nodelib/fs.walk";
import { stat } from "node:fs/promises";
import type { Ignorer } from "./ignore.js";
import {
  MergeImportError,
  errorCode,
  errorMessage,
  wrapFsError,
} from "./errors.js";
import { toRel } from "./path-rel.js";

export type FileEntry = {
  abs: string;
  rel: string;
};

function walkAll(root: string, options: walk.Options): Promise<walk.Entry[]> {
  return new Promise((resolve, reject) => {
    walk.walk(root, options, (err, entries) => {
      if (err) reject(err);
      else resolve(entries);
    });
  });
}

/**
 * Lists the regular files under root, sorted by name within each
 * directory. Symbolic links are neither listed nor followed.
 */
export async function listRegularFiles(
  root: string,
  ig: Ignorer,
): Promise<FileEntry[]> {
  const entries = await wrapFsError("walk", root, () =>
    walkAll(root, {
      followSymbolicLinks: false,
      deepFilter: (e) => !ig.ignoresDir(toRel(e.path, root)),
      entryFilter: (e) =>
        e.dirent.isFile() && !ig.ignoresFile(toRel(e.path, root)),
    }),
  );
  return entries
    .map((e) => ({ abs: e.path, rel: toRel(e.path, root) }))
    .sort((a, b) => compareRel(a.rel, b.rel));
}

// segment-wise, so "a/x" sorts before "a-b/x"
export function compareRel(a: string, b: string): number {
  const sa = a.split("/");
  const sb = b.split("/");
  const n = Math.min(sa.length, sb.length);
  for (let i = 0; i < n; i++) {
    if (sa[i] !== sb[i]) return sa[i] < sb[i] ? -1 : 1;
  }
  return sa.length - sb.length;
}

const MISSING_CODES = new Set(["ENOENT", "ENOTDIR", "ELOOP"]);

// Follows symbolic links: a dangling link does not exist.
export async function pathExists(p: string): Promise<boolean> {
  try {
    await stat(p);
    return true;
  } catch (err) {
    const code = errorCode(err);
    if (code && MISSING_CODES.has(code)) return false;
    throw new MergeImportError(`stat failed for ${p}: ${errorMessage(err)}`, {
      op: "stat",
      path: p,
      code,
    }, { cause: err });
  }
}

export async function assertDirectory(label: string, p: string) {
  const st = await wrapFsError(`stat ${label} root`, p, () => stat(p));
  if (!st.isDirectory()) {
    throw new MergeImportError(`${label} root is not a directory: ${p}`, {
      root: label,
      path: p,
    });
  }
}
