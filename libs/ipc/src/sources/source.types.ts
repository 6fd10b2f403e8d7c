/**
 * Federated source domain types
 *
 * A skill document can come from the local registry or from any external
 * code-hosting backend. Every provider answers with the same shapes so the
 * federation layer can merge them into one view.
 */

/** Built-in provider identities */
export const SOURCE_TYPES = {
  local: 'local',
  skillsSh: 'skills.sh',
  github: 'github',
  gitlab: 'gitlab',
  bitbucket: 'bitbucket',
  codeberg: 'codeberg',
} as const;

export type KnownSourceType = (typeof SOURCE_TYPES)[keyof typeof SOURCE_TYPES];

/** Provider identity. Third-party providers may register their own tags. */
export type SourceType = KnownSourceType | (string & {});

/**
 * Skill document metadata, optionally with its body.
 *
 * `id` is scoped to `source`: two skills are the same entity only when both
 * `source` and `id` match.
 */
export interface ExternalSkill {
  id: string;
  slug: string;
  name: string;
  description: string;
  /** Body of the SKILL.md document. Empty until fetched lazily. */
  content?: string;
  tags?: string[];
  source: SourceType;
  /** Link to the upstream document */
  sourceUrl: string;
  repoOwner?: string;
  repoName?: string;
  stars?: number;
  /** Where the body can be fetched from when `content` is empty */
  contentUrl?: string;
  version?: string;
  /** ISO-8601 timestamp */
  updatedAt?: string;
}

export interface SearchOptions {
  query: string;
  tags?: string[];
  /** 1-based page number */
  page: number;
  perPage: number;
}

/** One provider's answer to a search */
export interface SearchResult {
  skills: ExternalSkill[];
  /** Total matches as reported by the provider (may exceed `skills.length`) */
  total: number;
  page: number;
  perPage: number;
  searchTimeMs: number;
  source: SourceType;
}

/** The merged answer across every searched provider */
export interface FederatedResult {
  skills: ExternalSkill[];
  /** Sum of each contributing provider's self-reported total */
  total: number;
  bySource: Map<SourceType, number>;
  /** Present only for providers whose search failed */
  errors: Map<SourceType, Error>;
  sourceTimes: Map<SourceType, number>;
  /** Wall-clock time of the whole fan-out, join and merge */
  searchTimeMs: number;
}

/** Per-source admission policy. `requestsPerMinute: 0` disables limiting. */
export interface RateLimit {
  requestsPerMinute: number;
  burstSize: number;
}
