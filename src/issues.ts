import type { Issue, IssueKind, Severity, Status } from "./types.js";

export function now(): string {
  return new Date().toISOString();
}

/**
 * Maps a free-form kind to an issue kind.
 * Only "task" (any case) selects a task; everything else is a bug.
 */
export function resolveKind(kind?: string): IssueKind {
  return kind !== undefined && kind.toLowerCase() === "task" ? "task" : "bug";
}

export function issueLabel(issue: Issue): "BUG" | "TASK" {
  return issue.kind === "task" ? "TASK" : "BUG";
}

export function newIssue(
  issueId: string,
  title: string,
  description: string,
  severity: Severity,
  kind: IssueKind
): Issue {
  const timestamp = now();
  return {
    issueId,
    kind,
    title,
    description,
    severity,
    status: "NEW",
    attachments: Object.freeze([]),
    tags: Object.freeze([]),
    createdAt: timestamp,
    modifiedAt: timestamp,
    history: Object.freeze([{ timestamp, action: `Issue created as ${kind}` }]),
  };
}

/** Appends a history entry and bumps modifiedAt. */
export function recordChange(issue: Issue, action: string): void {
  const timestamp = now();
  issue.modifiedAt = timestamp;
  issue.history = Object.freeze([...issue.history, { timestamp, action }]);
}

/**
 * Sets the status unconditionally. No transition is rejected: any status
 * may follow any other, including itself.
 */
export function setIssueStatus(issue: Issue, status: Status, reason?: string): void {
  const from = issue.status;
  issue.status = status;
  recordChange(
    issue,
    reason === undefined
      ? `Status changed from ${from} to ${status}`
      : `Status changed from ${from} to ${status} (${reason})`
  );
}

export function filterBySeverity(issues: readonly Issue[], severity: Severity): Issue[] {
  return issues.filter((i) => i.severity === severity);
}
