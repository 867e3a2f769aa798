import {
  ENV_DIFF3,
  ENV_DIFF3_CONFLICT_CODES,
  ENV_LOG_LEVEL,
} from "./constants.js";
import { loggerFromLevel, type ConsoleLogger } from "./logger.js";
import type { Diff3Options } from "./diff3.js";
import { MergeImportError } from "./errors.js";

export function parseExitCodes(raw: string): number[] {
  const codes: number[] = [];
  for (const part of raw.split(",")) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    const n = Number(trimmed);
    if (!Number.isInteger(n) || n < 0 || n > 255) {
      throw new MergeImportError(`invalid exit code '${trimmed}'`, {
        value: raw,
      });
    }
    if (!codes.includes(n)) codes.push(n);
  }
  return codes;
}

export function diff3OptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): Diff3Options {
  const opts: Diff3Options = {};
  const command = env[ENV_DIFF3]?.trim();
  if (command) opts.command = command;
  const codes = env[ENV_DIFF3_CONFLICT_CODES];
  if (codes && codes.trim()) {
    const parsed = parseExitCodes(codes);
    if (parsed.includes(0)) {
      throw new MergeImportError(
        `${ENV_DIFF3_CONFLICT_CODES} cannot include 0, which means a clean merge`,
        { value: codes },
      );
    }
    opts.conflictExitCodes = parsed;
  }
  return opts;
}

export function loggerFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): ConsoleLogger {
  return loggerFromLevel(env[ENV_LOG_LEVEL]);
}
