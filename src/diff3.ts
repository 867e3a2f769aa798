import { spawn } from "node:child_process";
import { MergeToolError, errorMessage } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import type { MergeOutcome, MergeRequest, MergeTool } from "./merge-tool.js";
import {
  DEFAULT_CONFLICT_EXIT_CODES,
  DEFAULT_DIFF3_COMMAND,
} from "./constants.js";

export type Diff3Labels = {
  mine: string;
  base: string;
  theirs: string;
};

export type Diff3Options = {
  command?: string;
  /** inserted before the diff3 arguments, e.g. a script for a wrapper */
  args?: string[];
  conflictExitCodes?: readonly number[];
  labels?: Diff3Labels;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
};

type RunResult = {
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: Buffer;
  stderr: string;
  spawnError?: Error;
};

function truncateMiddle(s: string, max: number): string {
  if (s.length <= max) return s;
  const half = Math.floor((max - 3) / 2);
  return `${s.slice(0, half)}...${s.slice(s.length - half)}`;
}

export function diff3Args(
  request: MergeRequest,
  labels?: Diff3Labels,
): string[] {
  const args = ["-m"];
  if (labels) {
    args.push("-L", labels.mine, "-L", labels.base, "-L", labels.theirs);
  }
  args.push(request.mine, request.base, request.theirs);
  return args;
}

export class Diff3MergeTool implements MergeTool {
  private readonly command: string;
  private readonly prefixArgs: string[];
  private readonly conflictExitCodes: readonly number[];
  private readonly labels?: Diff3Labels;
  private readonly env?: NodeJS.ProcessEnv;
  private readonly logger: Logger;

  constructor(opts: Diff3Options = {}) {
    this.command = opts.command ?? DEFAULT_DIFF3_COMMAND;
    this.prefixArgs = opts.args ?? [];
    this.conflictExitCodes =
      opts.conflictExitCodes ?? DEFAULT_CONFLICT_EXIT_CODES;
    this.labels = opts.labels;
    this.env = opts.env;
    this.logger = opts.logger ?? new NullLogger();
  }

  async merge(request: MergeRequest): Promise<MergeOutcome> {
    const args = [...this.prefixArgs, ...diff3Args(request, this.labels)];
    const t = Date.now();
    const res = await this.run(args, request.scratchDir);
    const context = {
      command: this.command,
      mine: request.mine,
      code: res.code,
    };
    if (this.logger.isLevelEnabled("debug")) {
      this.logger.debug("diff3 exit", {
        ...context,
        signal: res.signal,
        elapsedMs: Date.now() - t,
      });
    }

    if (res.spawnError) {
      return {
        kind: "failed",
        error: new MergeToolError(
          `Could not execute ${this.command}: ${res.spawnError.message}`,
          null,
          context,
          { cause: res.spawnError },
        ),
      };
    }
    if (res.code === 0) {
      return { kind: "clean", content: res.stdout };
    }
    if (res.code !== null && this.conflictExitCodes.includes(res.code)) {
      return { kind: "conflict" };
    }
    const reason =
      res.code === null
        ? `killed by ${res.signal ?? "unknown signal"}`
        : `exit code ${res.code}`;
    const stderr = res.stderr.trim();
    return {
      kind: "failed",
      error: new MergeToolError(
        `${this.command} failed (${reason})${stderr ? `: ${truncateMiddle(stderr, 400)}` : ""}`,
        res.code,
        { ...context, signal: res.signal },
      ),
    };
  }

  private run(args: string[], cwd: string): Promise<RunResult> {
    return new Promise<RunResult>((resolve) => {
      const stdout: Buffer[] = [];
      let stderr = "";
      let settled = false;
      const finish = (result: RunResult) => {
        if (settled) return;
        settled = true;
        resolve(result);
      };

      const child = spawn(this.command, args, {
        cwd,
        env: this.env ? { ...process.env, ...this.env } : process.env,
        stdio: ["ignore", "pipe", "pipe"],
      });

      child.stdout.on("data", (chunk: Buffer) => {
        stdout.push(chunk);
      });
      child.stderr.setEncoding("utf8");
      child.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });

      child.on("error", (err) => {
        this.logger.error("diff3 spawn error", {
          command: this.command,
          error: errorMessage(err),
        });
        finish({
          code: null,
          signal: null,
          stdout: Buffer.alloc(0),
          stderr,
          spawnError: err,
        });
      });

      // "close" rather than "exit": stdout must be fully drained
      child.on("close", (code, signal) => {
        finish({ code, signal, stdout: Buffer.concat(stdout), stderr });
      });
    });
  }
}
