export type TreeSide = "origin" | "destination";

export type PlannedOperation =
  | { op: "merge"; path: string }
  | { op: "conflict"; path: string }
  | { op: "copy"; from: TreeSide; to: TreeSide; path: string }
  | { op: "delete"; side: TreeSide; path: string };

export function describeOperation(op: PlannedOperation): string {
  switch (op.op) {
    case "merge":
      return `merge ${op.path}`;
    case "conflict":
      return `conflict ${op.path}`;
    case "copy":
      return `copy ${op.from}->${op.to} ${op.path}`;
    case "delete":
      return `delete ${op.side} ${op.path}`;
  }
}
