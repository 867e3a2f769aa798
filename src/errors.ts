export class MergeImportError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "MergeImportError";
  }
}

export class MergeToolError extends MergeImportError {
  constructor(
    message: string,
    public readonly code: number | null,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, context, options);
    this.name = "MergeToolError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) {
    return undefined;
  }
  const { code } = err;
  return typeof code === "string" ? code : undefined;
}

/**
 * Runs a file-system step and rethrows any failure as a MergeImportError
 * naming the step and the path involved.
 */
export async function wrapFsError<T>(
  op: string,
  target: string,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof MergeImportError) throw err;
    throw new MergeImportError(
      `${op} failed for ${target}: ${errorMessage(err)}`,
      { op, path: target, code: errorCode(err) },
      { cause: err },
    );
  }
}
