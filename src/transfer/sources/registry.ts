/**
 * Source Registry
 *
 * Maps a source platform to the factory that builds its MetadataSource.
 */

import type { MetadataSource, SourcePlatform } from '../types.js';
import { GitLabSource, type GitLabSourceConfig } from './gitlab.js';

export type SourceFactory = (config: GitLabSourceConfig) => MetadataSource;

const sources = new Map<SourcePlatform, SourceFactory>();

/**
 * Register a source for a platform.
 */
export function registerSource(platform: SourcePlatform, factory: SourceFactory): void {
  sources.set(platform, factory);
}

/**
 * Build the source for a platform, or null when none is registered.
 */
export function getSource(platform: SourcePlatform, config: GitLabSourceConfig): MetadataSource | null {
  const factory = sources.get(platform);
  return factory ? factory(config) : null;
}

export function listSources(): SourcePlatform[] {
  return [...sources.keys()];
}

export function hasSource(platform: SourcePlatform): boolean {
  return sources.has(platform);
}

// ─── Built-in Sources ────────────────────────────────────────

registerSource('gitlab', (config) => new GitLabSource(config));
