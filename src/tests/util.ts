import fsp from "node:fs/promises";
import { dirname, join } from "node:path";
import type { MergeOutcome, MergeRequest, MergeTool } from "../merge-tool.js";
import { MergeToolError } from "../errors.js";

export async function fileExists(p: string) {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}

export type Trees = {
  origin: string;
  destination: string;
  baseline: string;
  scratch: string;
};

export async function mkCase(tmpBase: string, name: string): Promise<Trees> {
  const base = join(tmpBase, name);
  const trees: Trees = {
    origin: join(base, "origin"),
    destination: join(base, "destination"),
    baseline: join(base, "baseline"),
    scratch: join(base, "scratch"),
  };
  for (const dir of Object.values(trees)) {
    await fsp.mkdir(dir, { recursive: true });
  }
  return trees;
}

export async function writeTree(root: string, files: Record<string, string>) {
  for (const [rel, content] of Object.entries(files)) {
    const abs = join(root, rel);
    await fsp.mkdir(dirname(abs), { recursive: true });
    await fsp.writeFile(abs, content);
  }
}

/** Regular files under root keyed by "/"-separated relative path. */
export async function readTree(root: string): Promise<Record<string, string>> {
  const out: Record<string, string> = {};
  async function visit(dir: string, prefix: string) {
    const entries = await fsp.readdir(dir, { withFileTypes: true });
    for (const e of entries) {
      const rel = prefix ? `${prefix}/${e.name}` : e.name;
      if (e.isDirectory()) {
        await visit(join(dir, e.name), rel);
      } else if (e.isFile()) {
        out[rel] = await fsp.readFile(join(dir, e.name), "utf8");
      }
    }
  }
  await visit(root, "");
  return out;
}

export async function snapshot(trees: Trees) {
  return {
    origin: await readTree(trees.origin),
    destination: await readTree(trees.destination),
    baseline: await readTree(trees.baseline),
  };
}

/**
 * Whole-file three-way merge: takes the side that changed, and reports a
 * conflict when both changed differently.
 */
export class WholeFileMergeTool implements MergeTool {
  readonly calls: MergeRequest[] = [];

  async merge(request: MergeRequest): Promise<MergeOutcome> {
    this.calls.push(request);
    const [mine, theirs, base] = await Promise.all([
      fsp.readFile(request.mine),
      fsp.readFile(request.theirs),
      fsp.readFile(request.base),
    ]);
    if (mine.equals(base)) return { kind: "clean", content: theirs };
    if (theirs.equals(base) || theirs.equals(mine)) {
      return { kind: "clean", content: mine };
    }
    return { kind: "conflict" };
  }
}

export class FailingMergeTool implements MergeTool {
  calls = 0;

  async merge(): Promise<MergeOutcome> {
    this.calls += 1;
    return {
      kind: "failed",
      error: new MergeToolError("Could not execute diff3: spawn ENOENT", null),
    };
  }
}

export class RaisingMergeTool implements MergeTool {
  constructor(private readonly error: Error = new Error("tool could not run")) {}

  async merge(): Promise<MergeOutcome> {
    throw this.error;
  }
}
