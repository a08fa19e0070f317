/**
 * GitHub Sink
 *
 * Writes metadata into an existing GitHub repository through the REST API.
 *
 * Target Structure:
 * - Labels: looked up by name, created when missing
 * - Milestones: looked up by title (state=all), created when missing
 * - Issues, comments, issue state: created/updated as instructed by the Import Stage
 * - Users: looked up by login or by a unique email search hit
 *
 * Every call, reads included, passes through the sink's RateLimiter.
 *
 * @see https://docs.github.com/en/rest
 */

import { z } from 'zod';
import type {
  CreatedIssue,
  DestinationPlatform,
  DestinationRepository,
  DestinationUser,
  EnsureResult,
  IssueInput,
  IssueState,
  Label,
  MetadataSink,
  Milestone,
  UserQuery,
} from '../types.js';
import { ForgeHttpClient } from '../http.js';
import { RateLimiter, type Clock, type RateLimitConfig } from '../rate-limiter.js';
import { ApiError, NotFoundError, PermanentWriteError } from '../errors.js';

// ─── API Schemas ─────────────────────────────────────────────

const RepositorySchema = z.object({
  name: z.string(),
  full_name: z.string(),
  html_url: z.string(),
  default_branch: z.string().nullish(),
});

const LabelSchema = z.object({ id: z.number(), name: z.string() });

const MilestoneSchema = z.object({ number: z.number(), title: z.string() });

const IssueSchema = z.object({ number: z.number(), html_url: z.string() });

const CommentSchema = z.object({ id: z.number() });

const UserSchema = z.object({ login: z.string(), id: z.number() });

const UserSearchSchema = z.object({
  total_count: z.number(),
  items: z.array(UserSchema),
});

const RateLimitSchema = z.object({
  resources: z.object({
    core: z.object({ limit: z.number(), remaining: z.number(), reset: z.number() }),
  }),
});

// ─── Configuration ───────────────────────────────────────────

export interface GitHubSinkConfig {
  /** API root (defaults to https://api.github.com) */
  apiUrl?: string;
  /** Personal access token */
  token: string;
  rateLimit?: RateLimitConfig;
  clock?: Clock;
  timeoutMs?: number;
  /** Aborts rate-limit waits and pending reads */
  signal?: AbortSignal;
}

/** GitHub rejects longer label descriptions */
export const LABEL_DESCRIPTION_LIMIT = 100;
export const MILESTONE_DESCRIPTION_LIMIT = 200;

// ─── Helpers ─────────────────────────────────────────────────

/**
 * Accepts `owner/repo` or a github.com URL.
 */
export function parseRepositoryName(ref: string): string {
  const trimmed = ref.trim().replace(/\/+$/, '').replace(/\.git$/, '');
  const path = /^https?:\/\//i.test(trimmed) ? new URL(trimmed).pathname.replace(/^\/+/, '') : trimmed;
  const [owner, name] = path.split('/');
  if (!owner || !name) {
    throw new NotFoundError(`Invalid GitHub repository (expected owner/repo): ${ref}`);
  }
  return `${owner}/${name}`;
}

/**
 * GitHub wants a timestamp; GitLab due dates are plain dates.
 */
export function toDueOn(dueDate?: string): string | undefined {
  if (!dueDate) return undefined;
  if (/^\d{4}-\d{2}-\d{2}$/.test(dueDate)) {
    return `${dueDate}T00:00:00Z`;
  }
  const parsed = Date.parse(dueDate);
  return Number.isNaN(parsed) ? undefined : new Date(parsed).toISOString();
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof PermanentWriteError && error.status === 422 && error.message.includes('already_exists');
}

// ─── GitHub Sink ─────────────────────────────────────────────

export class GitHubSink implements MetadataSink {
  readonly platform: DestinationPlatform = 'github';
  readonly limiter: RateLimiter;

  private readonly client: ForgeHttpClient;
  /** repo full name → milestone title → number */
  private readonly milestones = new Map<string, Map<string, number>>();

  constructor(config: GitHubSinkConfig) {
    this.limiter = new RateLimiter(config.rateLimit, config.clock);
    this.client = new ForgeHttpClient({
      baseUrl: config.apiUrl ?? 'https://api.github.com',
      headers: {
        Accept: 'application/vnd.github+json',
        Authorization: `Bearer ${config.token}`,
        'X-GitHub-Api-Version': '2022-11-28',
        'User-Agent': 'forgeport',
      },
      limiter: this.limiter,
      quotaHeaderPrefix: 'x-ratelimit-',
      timeoutMs: config.timeoutMs,
      signal: config.signal,
    });
  }

  async getRepository(ref: string): Promise<DestinationRepository> {
    const repo = await this.client.get(RepositorySchema, `/repos/${parseRepositoryName(ref)}`);
    return {
      fullName: repo.full_name,
      name: repo.name,
      htmlUrl: repo.html_url,
      defaultBranch: repo.default_branch ?? undefined,
    };
  }

  async hasCommits(repo: DestinationRepository): Promise<boolean> {
    try {
      const commits = await this.client.get(z.array(z.unknown()), `/repos/${repo.fullName}/commits`, {
        query: { per_page: 1 },
      });
      return commits.length > 0;
    } catch (err) {
      // 409 Conflict: "Git Repository is empty."
      if (err instanceof ApiError && err.status === 409) {
        return false;
      }
      throw err;
    }
  }

  // ─── Labels ────────────────────────────────────────────────

  async ensureLabel(repo: DestinationRepository, label: Label): Promise<EnsureResult> {
    const existing = await this.findLabel(repo, label.name);
    if (existing) {
      return { id: existing.id, created: false };
    }

    try {
      const { data } = await this.client.request(LabelSchema, 'POST', `/repos/${repo.fullName}/labels`, {
        body: {
          name: label.name,
          color: label.color,
          description: truncate(label.description, LABEL_DESCRIPTION_LIMIT),
        },
      });
      return { id: data.id, created: true };
    } catch (err) {
      if (isAlreadyExists(err)) {
        const raced = await this.findLabel(repo, label.name);
        if (raced) return { id: raced.id, created: false };
      }
      throw err;
    }
  }

  private async findLabel(repo: DestinationRepository, name: string): Promise<z.infer<typeof LabelSchema> | null> {
    try {
      return await this.client.get(LabelSchema, `/repos/${repo.fullName}/labels/${encodeURIComponent(name)}`);
    } catch (err) {
      if (err instanceof NotFoundError) return null;
      throw err;
    }
  }

  // ─── Milestones ────────────────────────────────────────────

  async ensureMilestone(repo: DestinationRepository, milestone: Milestone): Promise<EnsureResult> {
    const known = await this.loadMilestones(repo);
    const existing = known.get(milestone.title);
    if (existing !== undefined) {
      return { id: existing, created: false };
    }

    try {
      const { data } = await this.client.request(MilestoneSchema, 'POST', `/repos/${repo.fullName}/milestones`, {
        body: {
          title: milestone.title,
          state: milestone.state,
          description: truncate(milestone.description, MILESTONE_DESCRIPTION_LIMIT),
          due_on: toDueOn(milestone.dueDate),
        },
      });
      known.set(data.title, data.number);
      return { id: data.number, created: true };
    } catch (err) {
      if (isAlreadyExists(err)) {
        this.milestones.delete(repo.fullName);
        const raced = (await this.loadMilestones(repo)).get(milestone.title);
        if (raced !== undefined) return { id: raced, created: false };
      }
      throw err;
    }
  }

  private async loadMilestones(repo: DestinationRepository): Promise<Map<string, number>> {
    const cached = this.milestones.get(repo.fullName);
    if (cached) return cached;

    const byTitle = new Map<string, number>();
    for await (const milestone of this.client.paginate(MilestoneSchema, `/repos/${repo.fullName}/milestones`, {
      state: 'all',
    })) {
      byTitle.set(milestone.title, milestone.number);
    }
    this.milestones.set(repo.fullName, byTitle);
    return byTitle;
  }

  // ─── Issues & comments ─────────────────────────────────────

  async createIssue(repo: DestinationRepository, input: IssueInput): Promise<CreatedIssue> {
    const { data } = await this.client.request(IssueSchema, 'POST', `/repos/${repo.fullName}/issues`, {
      body: {
        title: input.title,
        body: input.body,
        labels: input.labels,
        milestone: input.milestone,
      },
    });
    return { number: data.number, url: data.html_url };
  }

  async addComment(repo: DestinationRepository, issueNumber: number, body: string): Promise<{ id: number }> {
    const { data } = await this.client.request(
      CommentSchema,
      'POST',
      `/repos/${repo.fullName}/issues/${issueNumber}/comments`,
      { body: { body } },
    );
    return { id: data.id };
  }

  async setIssueState(repo: DestinationRepository, issueNumber: number, state: IssueState): Promise<void> {
    await this.client.request(IssueSchema, 'PATCH', `/repos/${repo.fullName}/issues/${issueNumber}`, {
      body: { state },
    });
  }

  // ─── Users & quota ─────────────────────────────────────────

  async findUser(query: UserQuery): Promise<DestinationUser | null> {
    if (query.email) {
      const result = await this.client.get(UserSearchSchema, '/search/users', {
        query: { q: `${query.email} in:email` },
      });
      const [only] = result.items;
      if (result.total_count === 1 && only) {
        return { username: only.login, id: only.id };
      }
    }

    if (query.username) {
      try {
        const user = await this.client.get(UserSchema, `/users/${encodeURIComponent(query.username)}`);
        return { username: user.login, id: user.id };
      } catch (err) {
        if (err instanceof NotFoundError) return null;
        throw err;
      }
    }

    return null;
  }

  async refreshQuota(): Promise<void> {
    const { resources } = await this.client.get(RateLimitSchema, '/rate_limit');
    this.limiter.update({
      limit: resources.core.limit,
      remaining: resources.core.remaining,
      resetAt: resources.core.reset * 1000,
    });
  }
}
