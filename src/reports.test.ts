import { beforeEach, describe, expect, it } from "vitest";
import { listAllIssues, projectDashboard, severityReport } from "./reports.js";
import { TrackerService } from "./trackerService.js";
import { SEVERITIES, type Severity } from "./types.js";

let service: TrackerService;

beforeEach(() => {
  service = new TrackerService();
  service.createProject("P1", "Alpha", "https://repo/alpha");
});

// ---------------------------------------------------------------------------
// projectDashboard
// ---------------------------------------------------------------------------
describe("projectDashboard", () => {
  it("reports all four severities at zero for an empty backlog", () => {
    const dashboard = projectDashboard(service, "P1");
    expect(dashboard).toEqual({
      projectId: "P1",
      name: "Alpha",
      counts: { LOW: 0, MEDIUM: 0, HIGH: 0, CRITICAL: 0 },
    });
  });

  it("keeps the severities in canonical order", () => {
    const dashboard = projectDashboard(service, "P1");
    expect(Object.keys(dashboard?.counts ?? {})).toEqual([...SEVERITIES]);
  });

  it("counts backlog issues by their current severity", () => {
    service.addIssueToProject("P1", service.createIssue("I1", "t", "d", "CRITICAL"));
    service.addIssueToProject("P1", service.createIssue("I2", "t", "d", "LOW"));
    service.addIssueToProject("P1", service.createIssue("I3", "t", "d", "LOW"));
    service.updateIssue("I3", { severity: "HIGH" });

    const dashboard = projectDashboard(service, "P1");
    expect(dashboard?.counts).toEqual({ LOW: 1, MEDIUM: 0, HIGH: 1, CRITICAL: 1 });
  });

  it("sums to the backlog size", () => {
    const severities: Severity[] = ["LOW", "MEDIUM", "MEDIUM", "CRITICAL", "HIGH"];
    severities.forEach((severity, i) => {
      service.addIssueToProject("P1", service.createIssue(`I${i}`, "t", "d", severity));
    });

    const counts = projectDashboard(service, "P1")?.counts;
    expect(counts).toEqual({ LOW: 1, MEDIUM: 2, HIGH: 1, CRITICAL: 1 });
    const total = SEVERITIES.reduce((sum, s) => sum + (counts?.[s] ?? 0), 0);
    expect(total).toBe(5);
  });

  it("ignores issues that are registered but not in the backlog", () => {
    service.createIssue("I1", "t", "d", "HIGH");
    expect(projectDashboard(service, "P1")?.counts.HIGH).toBe(0);
  });

  it("returns null for an unknown project", () => {
    expect(projectDashboard(service, "missing")).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// severityReport
// ---------------------------------------------------------------------------
describe("severityReport", () => {
  it("lists every backlog issue in backlog order", () => {
    service.createUser("U2", "Bob", "DEV", "bob@example.com");
    const i1 = service.createIssue("I1", "NPE", "d", "CRITICAL");
    const i2 = service.createIssue("I2", "Layout", "d", "LOW", "task");
    service.addIssueToProject("P1", i2);
    service.addIssueToProject("P1", i1);
    service.assignIssue("I1", "U2");

    expect(severityReport(service, "P1")).toEqual([
      { issueId: "I2", title: "Layout", severity: "LOW", status: "NEW" },
      { issueId: "I1", title: "NPE", severity: "CRITICAL", status: "IN_PROGRESS" },
    ]);
  });

  it("returns an empty list for an unknown project", () => {
    expect(severityReport(service, "missing")).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// listAllIssues
// ---------------------------------------------------------------------------
describe("listAllIssues", () => {
  it("describes every registered issue with its variant label", () => {
    service.createIssue("I1", "NPE", "d", "CRITICAL", "bug");
    service.createIssue("I2", "Layout", "d", "LOW", "task");
    service.changeStatus("I2", "RESOLVED");

    const listings = listAllIssues(service);
    expect(listings).toHaveLength(2);
    expect(listings).toContainEqual({
      label: "BUG",
      issueId: "I1",
      title: "NPE",
      status: "NEW",
      severity: "CRITICAL",
    });
    expect(listings).toContainEqual({
      label: "TASK",
      issueId: "I2",
      title: "Layout",
      status: "RESOLVED",
      severity: "LOW",
    });
  });

  it("includes issues that belong to no project", () => {
    service.createIssue("I1", "Orphan", "d", "MEDIUM");
    expect(listAllIssues(service).map((l) => l.issueId)).toEqual(["I1"]);
  });

  it("returns an empty list when nothing is registered", () => {
    expect(listAllIssues(service)).toEqual([]);
  });
});
