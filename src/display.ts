import { SEVERITIES, type IssueListing, type ProjectDashboard, type SeverityReportRow } from "./types.js";

export function renderDashboard(dashboard: ProjectDashboard): string[] {
  return [
    `Project: ${dashboard.name}`,
    ...SEVERITIES.map((s) => `${s}: ${dashboard.counts[s]}`),
  ];
}

export function renderSeverityReport(rows: SeverityReportRow[]): string[] {
  return rows.map((r) => `${r.issueId} ${r.title} ${r.severity} ${r.status}`);
}

export function renderIssueListing(listings: IssueListing[]): string[] {
  return listings.map((l) => `[${l.label}] ${l.issueId} ${l.title} ${l.status} ${l.severity}`);
}
