/**
 * Shared test data for the transfer pipeline tests.
 */

import { vi } from 'vitest';
import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  SNAPSHOT_SCHEMA_VERSION,
  type Comment,
  type DestinationRepository,
  type Identity,
  type Issue,
  type Snapshot,
  type SourceComment,
  type SourceIssue,
  type SourceMergeRequest,
  type SourceProject,
  type UserRef,
} from '../types.js';

export const NOW = '2025-01-01T00:00:00.000Z';

export const PROJECT: SourceProject = {
  id: 42,
  name: 'Widget',
  pathWithNamespace: 'acme/widget',
  webUrl: 'https://gitlab.example.com/acme/widget',
};

export const REPO: DestinationRepository = {
  fullName: 'acme/widget',
  name: 'widget',
  htmlUrl: 'https://github.com/acme/widget',
  defaultBranch: 'main',
};

export const ALICE: Identity = {
  sourceId: 1,
  sourceUsername: 'alice',
  fallbackName: 'Alice Smith',
  email: 'alice@example.com',
};

export const BOB: Identity = {
  sourceId: 2,
  sourceUsername: 'bob',
  fallbackName: 'Bob Jones',
};

export function makeComment(iid: number, position: number, overrides: Partial<Comment> = {}): Comment {
  return {
    position,
    sourceId: iid * 100 + position,
    authorId: ALICE.sourceId,
    createdAt: '2024-03-02T09:00:00Z',
    body: `comment ${position + 1} on #${iid}`,
    sourceUrl: `${PROJECT.webUrl}/-/issues/${iid}#note_${iid * 100 + position}`,
    ...overrides,
  };
}

export function makeIssue(iid: number, overrides: Partial<Issue> = {}): Issue {
  return {
    sourceId: 1000 + iid,
    iid,
    title: `Issue ${iid}`,
    body: `Body of issue ${iid}`,
    authorId: ALICE.sourceId,
    assigneeIds: [],
    state: 'open',
    labels: [],
    comments: [],
    createdAt: '2024-03-01T10:00:00Z',
    sourceUrl: `${PROJECT.webUrl}/-/issues/${iid}`,
    ...overrides,
  };
}

// ─── Source payloads ─────────────────────────────────────────

export const aliceRef: UserRef = { id: 1, username: 'alice', name: 'Alice Smith' };
export const bobRef: UserRef = { id: 2, username: 'bob', name: 'Bob Jones' };
export const carolRef: UserRef = { id: 3, username: 'carol', name: 'Carol White' };

export function sourceComment(iid: number, position: number, author: UserRef = aliceRef): SourceComment {
  return {
    position,
    sourceId: iid * 100 + position,
    author,
    createdAt: '2024-03-02T09:00:00Z',
    body: `comment ${position + 1}`,
    sourceUrl: `${PROJECT.webUrl}/-/issues/${iid}#note_${iid * 100 + position}`,
  };
}

export function sourceIssue(iid: number, overrides: Partial<SourceIssue> = {}): SourceIssue {
  return {
    sourceId: 1000 + iid,
    iid,
    title: `Issue ${iid}`,
    body: '',
    author: aliceRef,
    assignees: [],
    state: 'open',
    labels: [],
    comments: [],
    createdAt: '2024-03-01T10:00:00Z',
    sourceUrl: `${PROJECT.webUrl}/-/issues/${iid}`,
    ...overrides,
  };
}

export function sourceMergeRequest(iid: number, author: UserRef = aliceRef): SourceMergeRequest {
  return {
    ...sourceIssue(iid, { author }),
    state: 'merged',
    sourceBranch: 'feature',
    targetBranch: 'main',
    sourceUrl: `${PROJECT.webUrl}/-/merge_requests/${iid}`,
  };
}

// ─── Snapshot ────────────────────────────────────────────────

export function makeSnapshot(overrides: Partial<Snapshot> = {}): Snapshot {
  return {
    schemaVersion: SNAPSHOT_SCHEMA_VERSION,
    exportedAt: NOW,
    source: PROJECT,
    destination: REPO,
    labels: [],
    milestones: [],
    issues: [],
    mergeRequests: [],
    identities: [ALICE, BOB],
    ...overrides,
  };
}

export function identityMap(snapshot: Snapshot): Map<number, Identity> {
  return new Map(snapshot.identities.map((identity) => [identity.sourceId, identity]));
}

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `forgeport-${prefix}-`));
}

// ─── HTTP ────────────────────────────────────────────────────

export interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: unknown;
}

export type FetchHandler = (request: RecordedRequest) => Response;

export function jsonResponse(data: unknown, init: { status?: number; headers?: Record<string, string> } = {}): Response {
  return new Response(JSON.stringify(data), {
    status: init.status ?? 200,
    headers: { 'content-type': 'application/json', ...init.headers },
  });
}

/**
 * Replace global fetch with a handler; undo with vi.unstubAllGlobals().
 * Returns every request made, in order.
 */
export function stubFetch(handler: FetchHandler): RecordedRequest[] {
  const requests: RecordedRequest[] = [];
  vi.stubGlobal(
    'fetch',
    vi.fn(async (input: string | URL | Request, init: RequestInit = {}) => {
      const request: RecordedRequest = {
        method: init.method ?? 'GET',
        url: new URL(input instanceof Request ? input.url : input),
        headers: new Headers(init.headers),
        body: typeof init.body === 'string' ? JSON.parse(init.body) : undefined,
      };
      requests.push(request);
      return handler(request);
    }),
  );
  return requests;
}

/** `METHOD /path?query` of a recorded request */
export function describeRequest(request: RecordedRequest): string {
  return `${request.method} ${request.url.pathname}${request.url.search}`;
}
