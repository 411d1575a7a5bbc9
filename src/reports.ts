import { issueLabel } from "./issues.js";
import type { TrackerService } from "./trackerService.js";
import type {
  IssueListing,
  ProjectDashboard,
  SeverityHistogram,
  SeverityReportRow,
} from "./types.js";

/**
 * Counts of backlog issues per severity. Every severity is present, in
 * canonical order, even when its count is zero.
 * Returns null when the project is unknown.
 */
export function projectDashboard(
  service: TrackerService,
  projectId: string
): ProjectDashboard | null {
  const project = service.getProject(projectId);
  if (!project) return null;

  const counts: SeverityHistogram = { LOW: 0, MEDIUM: 0, HIGH: 0, CRITICAL: 0 };
  for (const issue of service.getBacklog(projectId)) {
    counts[issue.severity] += 1;
  }
  return { projectId: project.projectId, name: project.name, counts };
}

export function severityReport(service: TrackerService, projectId: string): SeverityReportRow[] {
  return service.getBacklog(projectId).map((i) => ({
    issueId: i.issueId,
    title: i.title,
    severity: i.severity,
    status: i.status,
  }));
}

/** Every registered issue, in registry order. */
export function listAllIssues(service: TrackerService): IssueListing[] {
  return service.getAllIssues().map((i) => ({
    label: issueLabel(i),
    issueId: i.issueId,
    title: i.title,
    status: i.status,
    severity: i.severity,
  }));
}
