import { constants } from "node:fs";
import { copyFile, mkdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  MergeImportError,
  MergeToolError,
  errorMessage,
  wrapFsError,
} from "./errors.js";
import { assertDirectory, listRegularFiles, pathExists } from "./fs-walk.js";
import { createIgnorer, type Ignorer } from "./ignore.js";
import { NullLogger, type Logger } from "./logger.js";
import type { MergeOutcome, MergeTool } from "./merge-tool.js";
import type { PlannedOperation } from "./operations.js";
import { toAbs } from "./path-rel.js";

export type MergeImportOptions = {
  mergeTool: MergeTool;
  logger?: Logger;
  /** gitignore-style rules; matching paths are left alone in every tree */
  ignoreRules?: string[];
  /** decide and merge, but write nothing to either tree */
  dryRun?: boolean;
};

export type MergeImportRoots = {
  origin: string;
  destination: string;
  baseline: string;
  scratch: string;
};

export type MergeImportReport = {
  /** absolute origin paths left unmerged */
  conflicts: string[];
  merged: string[];
  copied: string[];
  deleted: string[];
  /** origin files with no destination or baseline counterpart */
  skipped: string[];
  operations: PlannedOperation[];
  dryRun: boolean;
};

/**
 * State shared by the two passes of one merge import. The origin pass owns
 * it while running; the destination pass only reads `visited`.
 */
export class MergeImportState {
  /** relative paths the origin pass attempted to merge */
  readonly visited = new Set<string>();
  /** absolute origin paths the merge tool reported as conflicting */
  readonly conflicts = new Set<string>();
  readonly merged: string[] = [];
  readonly copied: string[] = [];
  readonly deleted: string[] = [];
  readonly skipped: string[] = [];
  readonly operations: PlannedOperation[] = [];
}

export type PassContext = {
  roots: MergeImportRoots;
  mergeTool: MergeTool;
  logger: Logger;
  ignorer: Ignorer;
  dryRun: boolean;
};

export async function originPass(
  ctx: PassContext,
  state: MergeImportState,
): Promise<void> {
  const { roots, logger } = ctx;
  const files = await listRegularFiles(roots.origin, ctx.ignorer);
  for (const { abs: originFile, rel } of files) {
    const destinationFile = toAbs(rel, roots.destination);
    const baselineFile = toAbs(rel, roots.baseline);
    if (
      !(await pathExists(destinationFile)) ||
      !(await pathExists(baselineFile))
    ) {
      state.skipped.push(rel);
      continue;
    }

    let outcome: MergeOutcome;
    try {
      outcome = await ctx.mergeTool.merge({
        mine: originFile,
        theirs: destinationFile,
        base: baselineFile,
        scratchDir: roots.scratch,
      });
    } catch (err) {
      if (err instanceof MergeImportError) throw err;
      throw new MergeToolError(
        `Could not execute merge tool: ${errorMessage(err)}`,
        null,
        { path: rel },
        { cause: err },
      );
    }
    state.visited.add(rel);

    if (outcome.kind === "failed") {
      throw outcome.error;
    }
    if (outcome.kind === "conflict") {
      logger.debug("merge conflict", { path: rel });
      state.conflicts.add(originFile);
      state.operations.push({ op: "conflict", path: rel });
      continue;
    }
    logger.debug("merged", { path: rel, bytes: outcome.content.length });
    if (!ctx.dryRun) {
      await wrapFsError("write", originFile, () =>
        writeFile(originFile, outcome.content),
      );
    }
    state.merged.push(rel);
    state.operations.push({ op: "merge", path: rel });
  }
}

export async function destinationPass(
  ctx: PassContext,
  state: MergeImportState,
): Promise<void> {
  const { roots, logger } = ctx;
  const files = await listRegularFiles(roots.destination, ctx.ignorer);
  for (const { abs: destinationFile, rel } of files) {
    if (state.visited.has(rel)) continue;
    const originFile = toAbs(rel, roots.origin);
    const baselineFile = toAbs(rel, roots.baseline);
    if (await pathExists(originFile)) continue;

    if (!(await pathExists(baselineFile))) {
      // never existed upstream: keep it by carrying it into origin
      logger.debug("destination-only file", { path: rel });
      if (!ctx.dryRun) {
        await wrapFsError("copy", originFile, async () => {
          await mkdir(path.dirname(originFile), { recursive: true });
          await copyFile(destinationFile, originFile, constants.COPYFILE_EXCL);
        });
      }
      state.copied.push(rel);
      state.operations.push({
        op: "copy",
        from: "destination",
        to: "origin",
        path: rel,
      });
    } else {
      logger.debug("deleted in origin", { path: rel });
      if (!ctx.dryRun) {
        await wrapFsError("delete", destinationFile, () =>
          rm(destinationFile, { force: false }),
        );
      }
      state.deleted.push(rel);
      state.operations.push({ op: "delete", side: "destination", path: rel });
    }
  }
}

export class MergeImportCoordinator {
  private readonly mergeTool: MergeTool;
  private readonly logger: Logger;
  private readonly ignorer: Ignorer;
  private readonly dryRun: boolean;

  constructor(opts: MergeImportOptions) {
    this.mergeTool = opts.mergeTool;
    this.logger = opts.logger ?? new NullLogger();
    this.ignorer = createIgnorer(opts.ignoreRules);
    this.dryRun = !!opts.dryRun;
  }

  /**
   * Merges destination-only changes into origin, which is the source of
   * truth. Files in all three trees are merged with the merge tool, files
   * only in destination are copied into origin, and files deleted from
   * origin since the baseline are deleted from destination. The baseline
   * tree is only read.
   *
   * Conflicts are reported as warnings and in the returned report; the
   * conflicting origin file is left as it was.
   */
  async mergeImport(
    originRoot: string,
    destinationRoot: string,
    baselineRoot: string,
    scratchDir: string,
  ): Promise<MergeImportReport> {
    const roots: MergeImportRoots = {
      origin: path.resolve(originRoot),
      destination: path.resolve(destinationRoot),
      baseline: path.resolve(baselineRoot),
      scratch: path.resolve(scratchDir),
    };
    await assertDirectory("origin", roots.origin);
    await assertDirectory("destination", roots.destination);
    await assertDirectory("baseline", roots.baseline);
    await wrapFsError("mkdir", roots.scratch, () =>
      mkdir(roots.scratch, { recursive: true }),
    );

    const t0 = Date.now();
    const state = new MergeImportState();
    const ctx: PassContext = {
      roots,
      mergeTool: this.mergeTool,
      logger: this.logger,
      ignorer: this.ignorer,
      dryRun: this.dryRun,
    };

    await originPass({ ...ctx, logger: this.logger.child("origin") }, state);
    await destinationPass(
      { ...ctx, logger: this.logger.child("destination") },
      state,
    );

    const conflicts = Array.from(state.conflicts).sort();
    for (const p of conflicts) {
      this.logger.warn(`Merge error for path ${p}`, { path: p });
    }
    this.logger.info("merge import complete", {
      merged: state.merged.length,
      conflicts: conflicts.length,
      copied: state.copied.length,
      deleted: state.deleted.length,
      dryRun: this.dryRun,
      elapsedMs: Date.now() - t0,
    });

    return {
      conflicts,
      merged: state.merged,
      copied: state.copied,
      deleted: state.deleted,
      skipped: state.skipped,
      operations: state.operations,
      dryRun: this.dryRun,
    };
  }
}

export async function mergeImport(
  originRoot: string,
  destinationRoot: string,
  baselineRoot: string,
  scratchDir: string,
  opts: MergeImportOptions,
): Promise<MergeImportReport> {
  return new MergeImportCoordinator(opts).mergeImport(
    originRoot,
    destinationRoot,
    baselineRoot,
    scratchDir,
  );
}
