import type { TrackerService } from "./trackerService.js";

/**
 * Populates the service with a small sample project: three users, two
 * backlog issues, one of them assigned and tagged.
 */
export function seedDemo(service: TrackerService): void {
  const qa = service.createUser("U1", "Alice", "QA", "alice@example.com");
  const dev = service.createUser("U2", "Bob", "DEV", "bob@example.com");
  const manager = service.createUser("M1", "Carol", "MANAGER", "carol@example.com");

  service.createProject("P1", "Alpha", "https://repo/alpha");
  for (const user of [qa, dev, manager]) {
    service.addUserToProject("P1", user);
  }

  const login = service.createIssue(
    "I1",
    "NullPointer in Login",
    "NPE when user logs in",
    "CRITICAL",
    "bug"
  );
  const layout = service.createIssue(
    "I2",
    "UI alignment",
    "Button misaligned on mobile",
    "LOW",
    "task"
  );
  service.addIssueToProject("P1", login);
  service.addIssueToProject("P1", layout);

  service.attachToIssue("I1", "screenshot.png");
  service.tagIssue("I1", "login");
  service.assignIssue("I1", "U2");
  service.changeStatus("I2", "IN_PROGRESS");
}
