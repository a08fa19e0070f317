/**
 * Sink Registry
 *
 * Maps a destination platform to the factory that builds its MetadataSink.
 */

import type { DestinationPlatform, MetadataSink } from '../types.js';
import { GitHubSink, type GitHubSinkConfig } from './github.js';

export type SinkFactory = (config: GitHubSinkConfig) => MetadataSink;

const sinks = new Map<DestinationPlatform, SinkFactory>();

/**
 * Register a sink for a platform.
 */
export function registerSink(platform: DestinationPlatform, factory: SinkFactory): void {
  sinks.set(platform, factory);
}

/**
 * Build the sink for a platform, or null when none is registered.
 */
export function getSink(platform: DestinationPlatform, config: GitHubSinkConfig): MetadataSink | null {
  const factory = sinks.get(platform);
  return factory ? factory(config) : null;
}

export function listSinks(): DestinationPlatform[] {
  return [...sinks.keys()];
}

export function hasSink(platform: DestinationPlatform): boolean {
  return sinks.has(platform);
}

// ─── Built-in Sinks ──────────────────────────────────────────

registerSink('github', (config) => new GitHubSink(config));
