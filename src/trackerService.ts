import { filterBySeverity, newIssue, now, recordChange, resolveKind, setIssueStatus } from "./issues.js";
import type {
  Issue,
  IssueChanges,
  Project,
  Role,
  Severity,
  Status,
  User,
  UserChanges,
} from "./types.js";

/**
 * Owns the user, project and issue registries.
 *
 * Lookups that miss are not errors: commands return false (or do nothing)
 * and queries return an empty result. Creating an entity under an id that
 * is already taken replaces the previous entry.
 */
export class TrackerService {
  private readonly users = new Map<string, User>();
  private readonly projects = new Map<string, Project>();
  private readonly issues = new Map<string, Issue>();

  // ---------------------------------------------------------------------------
  // Creation
  // ---------------------------------------------------------------------------

  createUser(id: string, name: string, role: Role, email: string): User {
    const user: User = { id, name, role, email, bio: "" };
    this.users.set(id, user);
    return user;
  }

  createProject(projectId: string, name: string, repoUrl: string): Project {
    const project: Project = {
      projectId,
      name,
      repoUrl,
      description: "",
      createdAt: now(),
      backlog: Object.freeze([]),
      team: Object.freeze([]),
    };
    this.projects.set(projectId, project);
    return project;
  }

  createIssue(
    issueId: string,
    title: string,
    description: string,
    severity: Severity,
    kind?: string
  ): Issue {
    const issue = newIssue(issueId, title, description, severity, resolveKind(kind));
    this.issues.set(issueId, issue);
    return issue;
  }

  // ---------------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------------

  getUser(id: string): User | undefined {
    return this.users.get(id);
  }

  getProject(projectId: string): Project | undefined {
    return this.projects.get(projectId);
  }

  getIssue(issueId: string): Issue | undefined {
    return this.issues.get(issueId);
  }

  getAllUsers(): User[] {
    return [...this.users.values()];
  }

  getAllProjects(): Project[] {
    return [...this.projects.values()];
  }

  getAllIssues(): Issue[] {
    return [...this.issues.values()];
  }

  getAssignee(issueId: string): User | undefined {
    const assigneeId = this.issues.get(issueId)?.assigneeId;
    return assigneeId === undefined ? undefined : this.users.get(assigneeId);
  }

  // ---------------------------------------------------------------------------
  // Issue operations
  // ---------------------------------------------------------------------------

  attachToIssue(issueId: string, attachment: string): void {
    const issue = this.issues.get(issueId);
    if (!issue) return;
    issue.attachments = Object.freeze([...issue.attachments, attachment]);
    recordChange(issue, `Attachment added: ${attachment}`);
  }

  tagIssue(issueId: string, tag: string): void {
    const issue = this.issues.get(issueId);
    if (!issue || issue.tags.includes(tag)) return;
    issue.tags = Object.freeze([...issue.tags, tag]);
    recordChange(issue, `Tagged "${tag}"`);
  }

  /**
   * Assigns the issue and moves it to IN_PROGRESS, whatever its prior
   * status. Nothing changes unless both the issue and the user exist.
   */
  assignIssue(issueId: string, userId: string): boolean {
    const issue = this.issues.get(issueId);
    const user = this.users.get(userId);
    if (!issue || !user) return false;

    issue.assigneeId = user.id;
    recordChange(issue, `Assigned to ${user.id}`);
    setIssueStatus(issue, "IN_PROGRESS");
    return true;
  }

  changeStatus(issueId: string, status: Status): boolean {
    const issue = this.issues.get(issueId);
    if (!issue) return false;
    setIssueStatus(issue, status);
    return true;
  }

  updateIssue(issueId: string, changes: IssueChanges): boolean {
    const issue = this.issues.get(issueId);
    if (!issue) return false;

    const fields: string[] = [];
    if (changes.title !== undefined) {
      issue.title = changes.title;
      fields.push("title");
    }
    if (changes.description !== undefined) {
      issue.description = changes.description;
      fields.push("description");
    }
    if (changes.severity !== undefined) {
      issue.severity = changes.severity;
      fields.push("severity");
    }
    if (fields.length > 0) recordChange(issue, `Updated ${fields.join(", ")}`);
    return true;
  }

  /** A role change also changes what `approveIssue` does for this user. */
  updateUser(id: string, changes: UserChanges): boolean {
    const user = this.users.get(id);
    if (!user) return false;
    if (changes.name !== undefined) user.name = changes.name;
    if (changes.role !== undefined) user.role = changes.role;
    if (changes.email !== undefined) user.email = changes.email;
    if (changes.bio !== undefined) user.bio = changes.bio;
    return true;
  }

  // ---------------------------------------------------------------------------
  // Project membership and backlog
  // ---------------------------------------------------------------------------

  setProjectDescription(projectId: string, description: string): boolean {
    const project = this.projects.get(projectId);
    if (!project) return false;
    project.description = description;
    return true;
  }

  addIssueToProject(projectId: string, issue: Issue): void {
    const project = this.projects.get(projectId);
    if (project) project.backlog = Object.freeze([...project.backlog, issue.issueId]);
  }

  addUserToProject(projectId: string, user: User): void {
    const project = this.projects.get(projectId);
    if (project) project.team = Object.freeze([...project.team, user.id]);
  }

  /** Unlinks the first matching backlog entry; the issue stays registered. */
  removeIssueFromProject(projectId: string, issueId: string): boolean {
    const project = this.projects.get(projectId);
    const backlog = project && withoutFirst(project.backlog, issueId);
    if (!project || !backlog) return false;
    project.backlog = backlog;
    return true;
  }

  /** Unlinks the first matching team entry; the user stays registered. */
  removeUserFromProject(projectId: string, userId: string): boolean {
    const project = this.projects.get(projectId);
    const team = project && withoutFirst(project.team, userId);
    if (!project || !team) return false;
    project.team = team;
    return true;
  }

  getBacklog(projectId: string): Issue[] {
    const project = this.projects.get(projectId);
    if (!project) return [];
    return resolveAll(project.backlog, this.issues);
  }

  getTeam(projectId: string): User[] {
    const project = this.projects.get(projectId);
    if (!project) return [];
    return resolveAll(project.team, this.users);
  }

  /** Backlog issues currently at the given severity, in backlog order. */
  listBySeverity(projectId: string, severity: Severity): Issue[] {
    return filterBySeverity(this.getBacklog(projectId), severity);
  }
}

function withoutFirst(ids: readonly string[], id: string): readonly string[] | undefined {
  const index = ids.indexOf(id);
  if (index === -1) return undefined;
  return Object.freeze([...ids.slice(0, index), ...ids.slice(index + 1)]);
}

function resolveAll<T>(ids: readonly string[], registry: ReadonlyMap<string, T>): T[] {
  const resolved: T[] = [];
  for (const id of ids) {
    const entity = registry.get(id);
    if (entity !== undefined) resolved.push(entity);
  }
  return resolved;
}
