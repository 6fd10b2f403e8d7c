/**
 * LocalSource — exposes the local skill registry as a source
 */

import type { ExternalSkill, SearchOptions, SearchResult } from '@skillforge/ipc';
import { SOURCE_TYPES, emptySearchResult } from '@skillforge/ipc';
import type { Source } from '../types';

/** A skill as persisted by the local registry */
export interface StoredSkill {
  id: string;
  slug: string;
  name: string;
  version: string;
  description: string;
  content: string;
  contentHash?: string;
  sourceFormat?: string;
  tags: string[];
  viewCount?: number;
  /** ISO-8601 */
  createdAt: string;
  /** ISO-8601 */
  updatedAt: string;
}

export interface SkillPage {
  skills: StoredSkill[];
  total: number;
}

/**
 * Read side of the local skill store. Pages are 1-based.
 */
export interface SkillRegistry {
  /** Look up by id or slug */
  getSkill(idOrSlug: string): Promise<StoredSkill | null>;
  searchSkills(query: string, page: number, perPage: number): Promise<SkillPage>;
  listSkillsByTag(tag: string, page: number, perPage: number): Promise<SkillPage>;
  listSkills(page: number, perPage: number): Promise<SkillPage>;
}

export class LocalSource implements Source {
  readonly name = SOURCE_TYPES.local;
  private enabled = true;

  constructor(private readonly registry?: SkillRegistry | null) {}

  /** Enabled only while a registry is attached and the flag is on */
  isEnabled(): boolean {
    return this.enabled && this.registry != null;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  /**
   * A query searches; otherwise the first tag filters; otherwise everything
   * is listed.
   */
  async search(options: SearchOptions): Promise<SearchResult> {
    if (!this.registry) return emptySearchResult(this.name, options);

    const { query, tags, page, perPage } = options;
    let found: SkillPage;
    if (query) {
      found = await this.registry.searchSkills(query, page, perPage);
    } else if (tags && tags.length > 0) {
      found = await this.registry.listSkillsByTag(tags[0], page, perPage);
    } else {
      found = await this.registry.listSkills(page, perPage);
    }

    return {
      skills: found.skills.map(toExternalSkill),
      total: found.total,
      page,
      perPage,
      searchTimeMs: 0,
      source: this.name,
    };
  }

  async getSkill(id: string): Promise<ExternalSkill | null> {
    if (!this.registry) return null;
    const stored = await this.registry.getSkill(id);
    return stored ? toExternalSkill(stored) : null;
  }

  async getContent(skill: ExternalSkill): Promise<string> {
    if (skill.content) return skill.content;
    if (!this.registry) return '';
    const stored = await this.registry.getSkill(skill.slug);
    return stored?.content ?? '';
  }
}

export function toExternalSkill(stored: StoredSkill): ExternalSkill {
  return {
    id: stored.id,
    slug: stored.slug,
    name: stored.name,
    description: stored.description,
    content: stored.content,
    tags: stored.tags,
    source: SOURCE_TYPES.local,
    sourceUrl: `/skill/${stored.slug}`,
    version: stored.version,
    updatedAt: stored.updatedAt,
  };
}
