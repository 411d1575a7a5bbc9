import { z } from "zod";

export const RoleSchema = z.enum(["QA", "DEV", "MANAGER"]);
export type Role = z.infer<typeof RoleSchema>;

// Declaration order is the canonical reporting order.
export const SeveritySchema = z.enum(["LOW", "MEDIUM", "HIGH", "CRITICAL"]);
export type Severity = z.infer<typeof SeveritySchema>;
export const SEVERITIES: readonly Severity[] = SeveritySchema.options;

export const StatusSchema = z.enum(["NEW", "IN_PROGRESS", "RESOLVED", "CLOSED"]);
export type Status = z.infer<typeof StatusSchema>;

export const IssueKindSchema = z.enum(["bug", "task"]);
export type IssueKind = z.infer<typeof IssueKindSchema>;

export interface HistoryEntry {
  timestamp: string;
  action: string;
}

export interface User {
  readonly id: string;
  name: string;
  role: Role;
  email: string;
  bio: string;
}

export interface Issue {
  readonly issueId: string;
  readonly kind: IssueKind;
  title: string;
  description: string;
  severity: Severity;
  status: Status;
  /** Id of the assigned user, resolved through the user registry. */
  assigneeId?: string;
  /** Append-only; changed through the service, never in place. */
  attachments: readonly string[];
  tags: readonly string[];
  readonly createdAt: string;
  modifiedAt: string;
  history: readonly HistoryEntry[];
}

export interface Project {
  readonly projectId: string;
  name: string;
  repoUrl: string;
  description: string;
  readonly createdAt: string;
  /** Issue ids in insertion order. */
  backlog: readonly string[];
  /** User ids in insertion order. */
  team: readonly string[];
}

export type UserChanges = Partial<Pick<User, "name" | "role" | "email" | "bio">>;

export type IssueChanges = Partial<Pick<Issue, "title" | "description" | "severity">>;

export type SeverityHistogram = Record<Severity, number>;

export interface ProjectDashboard {
  projectId: string;
  name: string;
  counts: SeverityHistogram;
}

export interface SeverityReportRow {
  issueId: string;
  title: string;
  severity: Severity;
  status: Status;
}

export interface IssueListing {
  label: "BUG" | "TASK";
  issueId: string;
  title: string;
  status: Status;
  severity: Severity;
}
