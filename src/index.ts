#!/usr/bin/env node
import { approveIssue } from "./approval.js";
import { loadConfig, type TrackerConfig } from "./config.js";
import { seedDemo } from "./demo.js";
import { renderDashboard, renderIssueListing, renderSeverityReport } from "./display.js";
import { listAllIssues, projectDashboard, severityReport } from "./reports.js";
import { TrackerService } from "./trackerService.js";

function print(config: TrackerConfig, value: unknown, lines: string[]): void {
  if (config.output === "json") {
    console.log(JSON.stringify(value, null, 2));
  } else {
    for (const line of lines) console.log(line);
  }
}

async function main(): Promise<void> {
  const config = loadConfig();
  const service = new TrackerService();
  seedDemo(service);
  console.error(`[Startup] Output: ${config.output}, approver: ${config.approverId}`);

  const dashboard = projectDashboard(service, "P1");
  if (dashboard) print(config, dashboard, renderDashboard(dashboard));

  const report = severityReport(service, "P1");
  print(config, report, renderSeverityReport(report));

  const before = listAllIssues(service);
  print(config, before, renderIssueListing(before));

  const approver = service.getUser(config.approverId);
  const issue = service.getIssue("I1");
  if (!approver || !issue) {
    throw new Error(`Approver ${config.approverId} or issue I1 not found`);
  }
  const approved = approveIssue(approver, issue);
  console.error(`[Approval] ${approver.id} on ${issue.issueId}: ${approved ? "approved" : "no effect"}`);

  const after = listAllIssues(service);
  print(config, after, renderIssueListing(after));
}

main().catch((err) => {
  console.error("[Fatal]", err);
  process.exit(1);
});
