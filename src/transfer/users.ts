/**
 * User Reconciler
 *
 * Maintains the human-editable mapping from GitLab users to GitHub accounts.
 * A manually entered github_username is authoritative; auto-resolution only
 * fills entries that are still empty (plus the id of manual entries).
 */

import type {
  AutoResolveMode,
  Identity,
  IdentityCounts,
  MappingEntry,
  MappingFile,
  MetadataSink,
  TransferEventHandler,
} from './types.js';
import { NotFoundError, TransferCancelledError, errorMessage, throwIfCancelled } from './errors.js';
import type { TransferStore } from './store.js';

// ─── Merge ───────────────────────────────────────────────────

function findPrior(prior: MappingFile, identity: Identity): MappingEntry | undefined {
  return prior[identity.sourceUsername] ?? Object.values(prior).find((entry) => entry.gitlab_id === identity.sourceId);
}

/**
 * Build the mapping for the current identities, carrying over what an earlier
 * run (or a human) recorded. Entries no longer referenced are kept.
 */
export function mergeMapping(identities: Identity[], prior: MappingFile | null = null): MappingFile {
  const merged: MappingFile = {};
  const carried = new Set<MappingEntry>();

  for (const identity of identities) {
    const previous = prior ? findPrior(prior, identity) : undefined;
    if (previous) carried.add(previous);

    const manual = previous?.github_username.trim() ?? '';
    merged[identity.sourceUsername] = {
      gitlab_id: identity.sourceId,
      gitlab_username: identity.sourceUsername,
      fallback_name: identity.fallbackName,
      email: identity.email ?? previous?.email ?? null,
      github_username: manual,
      github_id: manual ? (previous?.github_id ?? null) : null,
    };
  }

  for (const [key, entry] of Object.entries(prior ?? {})) {
    if (!carried.has(entry) && !(key in merged)) {
      merged[key] = { ...entry };
    }
  }

  return merged;
}

// ─── Auto-resolution ─────────────────────────────────────────

export interface AutoResolveOptions {
  signal?: AbortSignal;
  report?: TransferEventHandler;
}

export interface AutoResolveResult {
  mapping: MappingFile;
  /** Entries that gained a github_username */
  resolved: number;
  warnings: string[];
}

/**
 * Best-effort lookup of destination accounts. Never replaces a non-empty
 * github_username.
 */
export async function autoResolve(
  mapping: MappingFile,
  sink: MetadataSink,
  mode: AutoResolveMode,
  options: AutoResolveOptions = {},
): Promise<AutoResolveResult> {
  const result: MappingFile = {};
  const warnings: string[] = [];
  let resolved = 0;

  for (const [key, original] of Object.entries(mapping)) {
    const entry = { ...original };
    result[key] = entry;
    if (mode === 'off') continue;

    throwIfCancelled(options.signal);

    try {
      if (entry.github_username.trim()) {
        if (entry.github_id === null) {
          const user = await lookup(sink, { username: entry.github_username.trim() });
          if (user) entry.github_id = user.id;
        }
        continue;
      }

      let user = entry.email ? await lookup(sink, { email: entry.email }) : null;
      if (!user && mode === 'email+username') {
        user = await lookup(sink, { username: entry.gitlab_username });
      }
      if (user) {
        entry.github_username = user.username;
        entry.github_id = user.id;
        resolved++;
      }
    } catch (err) {
      if (err instanceof TransferCancelledError) {
        throw err;
      }
      const message = `Could not resolve ${entry.gitlab_username} on GitHub: ${errorMessage(err)}`;
      warnings.push(message);
      options.report?.({ type: 'warning', stage: 'reconciling', message });
    }
  }

  return { mapping: result, resolved, warnings };
}

async function lookup(sink: MetadataSink, query: { username?: string; email?: string }) {
  try {
    return await sink.findUser(query);
  } catch (err) {
    if (err instanceof NotFoundError) return null;
    throw err;
  }
}

// ─── Apply ───────────────────────────────────────────────────

/**
 * Identities as used for attribution during Import.
 */
export function applyMapping(identities: Identity[], mapping: MappingFile): Map<number, Identity> {
  const applied = new Map<number, Identity>();

  for (const identity of identities) {
    const entry = findPrior(mapping, identity);
    const username = entry?.github_username.trim() ?? '';
    applied.set(identity.sourceId, {
      ...identity,
      destinationUsername: username || undefined,
      destinationId: username ? (entry?.github_id ?? undefined) : undefined,
    });
  }

  return applied;
}

export function countIdentities(identities: Iterable<Identity>): IdentityCounts {
  let total = 0;
  let mapped = 0;
  for (const identity of identities) {
    total++;
    if (identity.destinationUsername) mapped++;
  }
  return { total, mapped, unmapped: total - mapped };
}

// ─── Reconcile ───────────────────────────────────────────────

export interface ReconcileOptions extends AutoResolveOptions {
  sink: MetadataSink;
  mode: AutoResolveMode;
}

export interface ReconcileResult {
  mapping: MappingFile;
  identities: Map<number, Identity>;
  counts: IdentityCounts;
  warnings: string[];
  path: string;
}

/**
 * Read the prior mapping, merge, auto-resolve and write it back.
 */
export async function reconcile(
  store: TransferStore,
  identities: Identity[],
  options: ReconcileOptions,
): Promise<ReconcileResult> {
  const prior = await store.readMapping();
  const merged = mergeMapping(identities, prior);
  const { mapping, resolved, warnings } = await autoResolve(merged, options.sink, options.mode, options);

  const path = await store.writeMapping(mapping);
  const applied = applyMapping(identities, mapping);
  const counts = countIdentities(applied.values());

  options.report?.({
    type: 'progress',
    stage: 'reconciling',
    message: `${counts.mapped}/${counts.total} users mapped (${resolved} auto-resolved)`,
  });

  return { mapping, identities: applied, counts, warnings, path };
}
