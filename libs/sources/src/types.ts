/**
 * Source capability — the contract every skill provider satisfies
 */

import type { ExternalSkill, SearchOptions, SearchResult, SourceType } from '@skillforge/ipc';

/**
 * A pluggable skill provider.
 *
 * Soft upstream failures (rejected credentials, upstream throttling) resolve
 * to an empty zero-total result. Transport and decoding failures reject.
 */
export interface Source {
  /** Provider identity, constant for the instance */
  readonly name: SourceType;
  /** Current availability; may change at runtime */
  isEnabled(): boolean;
  search(options: SearchOptions, signal?: AbortSignal): Promise<SearchResult>;
  /** Resolves `null` when the id is unknown or malformed */
  getSkill(id: string, signal?: AbortSignal): Promise<ExternalSkill | null>;
  /** Returns `skill.content` unchanged when it is already populated */
  getContent(skill: ExternalSkill, signal?: AbortSignal): Promise<string>;
}
