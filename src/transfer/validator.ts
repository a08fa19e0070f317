/**
 * Validator
 *
 * Fail-fast checks before anything is exported or written: both ends are
 * reachable, they plausibly describe the same project, the destination
 * already holds the pushed code, and the source metadata can be read.
 */

import type {
  DestinationRepository,
  MetadataSink,
  MetadataSource,
  ScopeCounts,
  SourceProject,
  ValidationCheck,
  ValidationReport,
} from './types.js';
import { NotFoundError, errorMessage } from './errors.js';

export const NAME_SIMILARITY_THRESHOLD = 0.6;

// ─── Name similarity ─────────────────────────────────────────

export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        (previous[j] ?? 0) + 1,
        (current[j - 1] ?? 0) + 1,
        (previous[j - 1] ?? 0) + cost,
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

/**
 * 1 for identical names, 0 for nothing in common.
 */
export function nameSimilarity(a: string, b: string): number {
  const left = normalizeName(a);
  const right = normalizeName(b);
  const longest = Math.max(left.length, right.length);
  if (longest === 0) return 0;
  return 1 - levenshtein(left, right) / longest;
}

export function namesLookRelated(a: string, b: string, threshold = NAME_SIMILARITY_THRESHOLD): boolean {
  const left = normalizeName(a);
  const right = normalizeName(b);
  if (!left || !right) return false;
  if (left === right || left.includes(right) || right.includes(left)) return true;
  return nameSimilarity(a, b) >= threshold;
}

function describeScope(scope: ScopeCounts): string {
  return `${scope.issues} issues, ${scope.mergeRequests} merge requests, ${scope.labels} labels, ${scope.milestones} milestones`;
}

// ─── Validator ───────────────────────────────────────────────

export interface ValidatorOptions {
  /** Report unrelated names as a warning instead of a failure */
  allowNameMismatch?: boolean;
}

export class Validator {
  private readonly source: MetadataSource;
  private readonly sink: MetadataSink;
  private readonly options: ValidatorOptions;

  constructor(source: MetadataSource, sink: MetadataSink, options: ValidatorOptions = {}) {
    this.source = source;
    this.sink = sink;
    this.options = options;
  }

  /**
   * Authentication errors propagate; a missing project or repository is a
   * failed check.
   */
  async validate(sourceRef: string, destinationRef: string): Promise<ValidationReport> {
    const checks: ValidationCheck[] = [];

    const source = await this.reach(checks, 'source-reachable', `GitLab project ${sourceRef}`, () =>
      this.source.getProject(sourceRef),
    );
    const destination = await this.reach(checks, 'destination-reachable', `GitHub repository ${destinationRef}`, () =>
      this.sink.getRepository(destinationRef),
    );

    let scope: ScopeCounts | undefined;
    if (source && destination) {
      checks.push(this.checkNames(source, destination));

      const hasCommits = await this.sink.hasCommits(destination);
      checks.push({
        name: 'destination-has-commits',
        status: hasCommits ? 'pass' : 'fail',
        detail: hasCommits
          ? `${destination.fullName} has commits`
          : `${destination.fullName} has no commits; push the repository before transferring metadata`,
      });

      try {
        scope = await this.source.countEntities(source);
        checks.push({ name: 'source-scope', status: 'pass', detail: describeScope(scope) });
      } catch (err) {
        if (!(err instanceof NotFoundError)) throw err;
        checks.push({ name: 'source-scope', status: 'fail', detail: `Cannot read project metadata: ${errorMessage(err)}` });
      }
    }

    const reasons = checks.filter((check) => check.status === 'fail').map((check) => check.detail);
    return { passed: reasons.length === 0, checks, reasons, source, destination, scope };
  }

  private async reach<T>(
    checks: ValidationCheck[],
    name: string,
    label: string,
    load: () => Promise<T>,
  ): Promise<T | undefined> {
    try {
      const value = await load();
      checks.push({ name, status: 'pass', detail: `${label} is reachable` });
      return value;
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
      checks.push({ name, status: 'fail', detail: `${label} not found: ${errorMessage(err)}` });
      return undefined;
    }
  }

  private checkNames(source: SourceProject, destination: DestinationRepository): ValidationCheck {
    const path = source.pathWithNamespace.split('/').pop() ?? source.name;
    const related = namesLookRelated(source.name, destination.name) || namesLookRelated(path, destination.name);
    if (related) {
      return {
        name: 'name-similarity',
        status: 'pass',
        detail: `"${source.name}" and "${destination.name}" look related`,
      };
    }
    return {
      name: 'name-similarity',
      status: this.options.allowNameMismatch ? 'warn' : 'fail',
      detail: `Project names differ: "${source.name}" (GitLab) vs "${destination.name}" (GitHub)`,
    };
  }
}
