import type { z } from "zod";

export type KnapsackInputIssue = {
  readonly path: string;
  readonly message: string;
};

export class KnapsackInputError extends Error {
  constructor(
    message: string,
    readonly issues: readonly KnapsackInputIssue[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${formatIssues(issues)}` : message);
    this.name = "KnapsackInputError";
  }
}

function formatIssues(issues: readonly KnapsackInputIssue[]): string {
  return issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join("; ");
}

export function formatIssuePath(path: readonly PropertyKey[]): string {
  return path.map((segment) => String(segment)).join(".");
}

export function inputErrorFromZod(message: string, error: z.ZodError): KnapsackInputError {
  return new KnapsackInputError(
    message,
    error.issues.map((issue) => ({
      path: formatIssuePath(issue.path),
      message: issue.message,
    })),
  );
}
