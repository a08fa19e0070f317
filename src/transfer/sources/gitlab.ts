/**
 * GitLab Source
 *
 * Reads project metadata from the GitLab REST API (v4).
 *
 * Source Structure:
 * - Labels, milestones: /projects/:id/labels, /projects/:id/milestones
 * - Issues with notes: /projects/:id/issues, /issues/:iid/notes (system notes dropped)
 * - Merge requests (closed/merged only): /projects/:id/merge_requests
 * - Users: /users/:id
 *
 * @see https://docs.gitlab.com/ee/api/rest/
 */

import { z } from 'zod';
import type {
  Identity,
  Label,
  MetadataSource,
  Milestone,
  ScopeCounts,
  SourceComment,
  SourceIssue,
  SourceMergeRequest,
  SourcePlatform,
  SourceProject,
  UserRef,
} from '../types.js';
import { ForgeHttpClient } from '../http.js';
import { RateLimiter, type Clock, type RateLimitConfig } from '../rate-limiter.js';
import { NotFoundError } from '../errors.js';

// ─── API Schemas ─────────────────────────────────────────────

const UserRefSchema = z.object({
  id: z.number(),
  username: z.string().optional(),
  name: z.string().optional(),
});

const UserSchema = z.object({
  id: z.number(),
  username: z.string(),
  name: z.string(),
  email: z.string().nullish(),
  public_email: z.string().nullish(),
});

const ProjectSchema = z.object({
  id: z.number(),
  name: z.string(),
  path_with_namespace: z.string(),
  web_url: z.string(),
});

const LabelSchema = z.object({
  name: z.string(),
  color: z.string().nullish(),
  description: z.string().nullish(),
});

const MilestoneSchema = z.object({
  title: z.string(),
  description: z.string().nullish(),
  state: z.string(),
  due_date: z.string().nullish(),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
});

const NoteSchema = z.object({
  id: z.number(),
  body: z.string(),
  created_at: z.string(),
  updated_at: z.string().nullish(),
  system: z.boolean().default(false),
  author: UserRefSchema,
});

const IssueSchema = z.object({
  id: z.number(),
  iid: z.number(),
  title: z.string(),
  description: z.string().nullish(),
  state: z.string(),
  created_at: z.string(),
  updated_at: z.string().nullish(),
  closed_at: z.string().nullish(),
  author: UserRefSchema,
  assignees: z.array(UserRefSchema).nullish(),
  assignee: UserRefSchema.nullish(),
  labels: z.array(z.string()).default([]),
  milestone: z.object({ title: z.string() }).nullish(),
  web_url: z.string(),
});

const MergeRequestSchema = IssueSchema.extend({
  merged_at: z.string().nullish(),
  source_branch: z.string(),
  target_branch: z.string(),
  sha: z.string().nullish(),
});

type GitLabIssue = z.infer<typeof IssueSchema>;

// ─── Configuration ───────────────────────────────────────────

export interface GitLabSourceConfig {
  /** Instance URL, e.g. https://gitlab.example.com */
  url: string;
  /** Personal access token */
  token: string;
  rateLimit?: RateLimitConfig;
  clock?: Clock;
  timeoutMs?: number;
  /** Aborts rate-limit waits and pending reads */
  signal?: AbortSignal;
}

// ─── Helpers ─────────────────────────────────────────────────

/**
 * Accepts `https://host/group/sub/project`, `group/project` or a numeric id.
 */
export function parseProjectPath(ref: string): string {
  const trimmed = ref.trim().replace(/\/+$/, '').replace(/\.git$/, '');
  if (/^https?:\/\//i.test(trimmed)) {
    const path = new URL(trimmed).pathname.replace(/^\/+/, '').split('/-/')[0] ?? '';
    if (!path) {
      throw new NotFoundError(`Invalid GitLab project URL: ${ref}`);
    }
    return path;
  }
  return trimmed.replace(/^\/+/, '');
}

function toUserRef(user: z.infer<typeof UserRefSchema>): UserRef {
  return { id: user.id, username: user.username, name: user.name };
}

function optional(value: string | null | undefined): string | undefined {
  return value ?? undefined;
}

// ─── GitLab Source ───────────────────────────────────────────

export class GitLabSource implements MetadataSource {
  readonly platform: SourcePlatform = 'gitlab';
  readonly limiter: RateLimiter;

  private readonly client: ForgeHttpClient;

  constructor(config: GitLabSourceConfig) {
    this.limiter = new RateLimiter(config.rateLimit, config.clock);
    this.client = new ForgeHttpClient({
      baseUrl: `${config.url.replace(/\/+$/, '')}/api/v4`,
      headers: { 'PRIVATE-TOKEN': config.token },
      limiter: this.limiter,
      quotaHeaderPrefix: 'ratelimit-',
      timeoutMs: config.timeoutMs,
      signal: config.signal,
    });
  }

  async getProject(ref: string): Promise<SourceProject> {
    const path = parseProjectPath(ref);

    try {
      const project = await this.client.get(ProjectSchema, `/projects/${encodeURIComponent(path)}`);
      return this.toProject(project);
    } catch (err) {
      if (!(err instanceof NotFoundError)) {
        throw err;
      }
    }

    // Fall back to a search by name: exact path first, then the last two segments
    const segments = path.split('/');
    const name = segments[segments.length - 1] ?? path;
    const candidates: z.infer<typeof ProjectSchema>[] = [];
    for await (const project of this.client.paginate(ProjectSchema, '/projects', { search: name, simple: 'true' })) {
      candidates.push(project);
    }

    const suffix = segments.slice(-2).join('/');
    const match =
      candidates.find((p) => p.path_with_namespace === path) ??
      candidates.find((p) => p.path_with_namespace.endsWith(suffix));

    if (!match) {
      throw new NotFoundError(`GitLab project not found: ${path}`);
    }
    return this.toProject(match);
  }

  async *listLabels(project: SourceProject): AsyncGenerator<Label, void, undefined> {
    for await (const label of this.client.paginate(LabelSchema, `/projects/${project.id}/labels`)) {
      yield {
        name: label.name,
        color: label.color ? label.color.replace(/^#/, '') : 'ffffff',
        description: label.description ?? '',
      };
    }
  }

  async *listMilestones(project: SourceProject): AsyncGenerator<Milestone, void, undefined> {
    for await (const milestone of this.client.paginate(MilestoneSchema, `/projects/${project.id}/milestones`)) {
      yield {
        title: milestone.title,
        description: milestone.description ?? '',
        dueDate: optional(milestone.due_date),
        state: milestone.state === 'closed' ? 'closed' : 'open',
        createdAt: optional(milestone.created_at),
        updatedAt: optional(milestone.updated_at),
      };
    }
  }

  async *listIssues(project: SourceProject): AsyncGenerator<SourceIssue, void, undefined> {
    const issues = this.client.paginate(IssueSchema, `/projects/${project.id}/issues`, {
      scope: 'all',
      order_by: 'created_at',
      sort: 'asc',
    });

    for await (const issue of issues) {
      const comments = await this.listNotes(project, 'issues', issue);
      yield {
        ...this.toBase(issue),
        state: issue.state === 'closed' ? 'closed' : 'open',
        comments,
      };
    }
  }

  async *listMergeRequests(project: SourceProject): AsyncGenerator<SourceMergeRequest, void, undefined> {
    const mergeRequests = this.client.paginate(MergeRequestSchema, `/projects/${project.id}/merge_requests`, {
      state: 'all',
      order_by: 'created_at',
      sort: 'asc',
    });

    for await (const mr of mergeRequests) {
      // Open merge requests cannot be represented at the destination
      const state = mr.state === 'merged' ? 'merged' : mr.state === 'closed' ? 'closed' : null;
      if (!state) {
        continue;
      }

      const comments = await this.listNotes(project, 'merge_requests', mr);
      yield {
        ...this.toBase(mr),
        state,
        mergedAt: optional(mr.merged_at),
        sourceBranch: mr.source_branch,
        targetBranch: mr.target_branch,
        sha: optional(mr.sha),
        comments,
      };
    }
  }

  async resolveUser(id: number): Promise<Identity | null> {
    try {
      const user = await this.client.get(UserSchema, `/users/${id}`);
      return {
        sourceId: user.id,
        sourceUsername: user.username,
        fallbackName: user.name,
        email: optional(user.email) ?? optional(user.public_email),
      };
    } catch (err) {
      if (err instanceof NotFoundError) {
        return null;
      }
      throw err;
    }
  }

  async countEntities(project: SourceProject): Promise<ScopeCounts> {
    const [issues, mergeRequests, labels, milestones] = await Promise.all([
      this.count(`/projects/${project.id}/issues`, { scope: 'all' }),
      this.count(`/projects/${project.id}/merge_requests`, { state: 'all' }),
      this.count(`/projects/${project.id}/labels`),
      this.count(`/projects/${project.id}/milestones`),
    ]);
    return { issues, mergeRequests, labels, milestones };
  }

  // ─── Internals ─────────────────────────────────────────────

  private toProject(project: z.infer<typeof ProjectSchema>): SourceProject {
    return {
      id: project.id,
      name: project.name,
      pathWithNamespace: project.path_with_namespace,
      webUrl: project.web_url,
    };
  }

  private toBase(issue: GitLabIssue) {
    const assignees = issue.assignees ?? (issue.assignee ? [issue.assignee] : []);
    return {
      sourceId: issue.id,
      iid: issue.iid,
      title: issue.title,
      body: issue.description ?? '',
      author: toUserRef(issue.author),
      assignees: assignees.map(toUserRef),
      labels: issue.labels,
      milestone: issue.milestone?.title,
      createdAt: issue.created_at,
      updatedAt: optional(issue.updated_at),
      closedAt: optional(issue.closed_at),
      sourceUrl: issue.web_url,
    };
  }

  private async listNotes(
    project: SourceProject,
    collection: 'issues' | 'merge_requests',
    parent: GitLabIssue,
  ): Promise<SourceComment[]> {
    const comments: SourceComment[] = [];
    const notes = this.client.paginate(NoteSchema, `/projects/${project.id}/${collection}/${parent.iid}/notes`, {
      order_by: 'created_at',
      sort: 'asc',
    });

    for await (const note of notes) {
      if (note.system) continue;
      comments.push({
        position: comments.length,
        sourceId: note.id,
        author: toUserRef(note.author),
        createdAt: note.created_at,
        updatedAt: optional(note.updated_at),
        body: note.body,
        sourceUrl: `${parent.web_url}#note_${note.id}`,
      });
    }
    return comments;
  }

  /**
   * Collection size from GitLab's `x-total` header, counting pages when the
   * header is omitted (large collections).
   */
  private async count(path: string, query: Record<string, string> = {}): Promise<number> {
    const response = await this.client.request(z.array(z.unknown()), 'GET', path, {
      query: { ...query, per_page: 1, page: 1 },
    });
    const total = response.headers.get('x-total');
    if (total !== null && total.trim() !== '' && Number.isFinite(Number(total))) {
      return Number(total);
    }

    let count = 0;
    for await (const _item of this.client.paginate(z.unknown(), path, query)) {
      count++;
    }
    return count;
  }
}
