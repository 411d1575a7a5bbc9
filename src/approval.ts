import { setIssueStatus } from "./issues.js";
import type { Issue, Role, User } from "./types.js";

type ApprovalPolicy = (approver: User, issue: Issue) => boolean;

const deny: ApprovalPolicy = () => false;

const APPROVAL_POLICIES: Record<Role, ApprovalPolicy> = {
  QA: deny,
  DEV: deny,
  // Critical issues are forced back into work whatever their current status.
  MANAGER: (approver, issue) => {
    if (issue.severity !== "CRITICAL") return false;
    setIssueStatus(issue, "IN_PROGRESS", `approved by ${approver.id}`);
    return true;
  },
};

/**
 * Applies the approval behaviour of the user's current role to the issue.
 * Returns true when the approval took effect.
 */
export function approveIssue(user: User, issue: Issue): boolean {
  return APPROVAL_POLICIES[user.role](user, issue);
}
