import type { MergeToolError } from "./errors.js";

export type MergeRequest = {
  /** origin copy of the file */
  mine: string;
  /** destination copy */
  theirs: string;
  /** baseline copy */
  base: string;
  scratchDir: string;
};

export type MergeOutcome =
  | { kind: "clean"; content: Buffer }
  | { kind: "conflict" }
  | { kind: "failed"; error: MergeToolError };

/**
 * A line-based three-way merge primitive. Implementations report content
 * conflicts as ordinary outcomes; only "failed" aborts a merge import.
 */
export interface MergeTool {
  merge(request: MergeRequest): Promise<MergeOutcome>;
}
