/**
 * BitbucketSource — SKILL.md files found through Bitbucket code search
 *
 * Skill ids are `workspace/repo[/path]`. Search keeps one skill per repository.
 */

import { z } from 'zod';
import type { ExternalSkill, SearchOptions, SearchResult } from '@skillforge/ipc';
import { SOURCE_TYPES } from '@skillforge/ipc';
import { SourceApiError } from '../errors';
import { encodePath, idSegments, isApiStatus } from './http-client';
import { RemoteSource } from './remote-source';
import type { RemoteSourceOptions } from './remote-source';

export const BITBUCKET_API_URL = 'https://api.bitbucket.org/2.0';

const BitbucketRepoSchema = z.object({
  name: z.string(),
  full_name: z.string().optional(),
  links: z.object({ html: z.object({ href: z.string() }).optional() }).optional(),
});

const BitbucketCodeResultSchema = z.object({
  file: z.object({
    path: z.string(),
    commit: z.object({ repository: BitbucketRepoSchema }),
  }),
});

const BitbucketSearchSchema = z.object({
  size: z.number(),
  values: z.array(BitbucketCodeResultSchema),
});

type BitbucketCodeResult = z.infer<typeof BitbucketCodeResultSchema>;

export interface BitbucketSourceOptions extends RemoteSourceOptions {
  username?: string;
  /** App password */
  password?: string;
}

export class BitbucketSource extends RemoteSource {
  readonly name = SOURCE_TYPES.bitbucket;

  constructor(options?: BitbucketSourceOptions) {
    const credentials =
      options?.username && options.password
        ? Buffer.from(`${options.username}:${options.password}`).toString('base64')
        : undefined;

    super({
      source: SOURCE_TYPES.bitbucket,
      baseUrl: options?.baseUrl ?? BITBUCKET_API_URL,
      timeoutMs: options?.timeoutMs,
      headers: {
        Accept: 'application/json',
        ...(credentials ? { Authorization: `Basic ${credentials}` } : {}),
      },
    });
  }

  async search(options: SearchOptions, signal?: AbortSignal): Promise<SearchResult> {
    const params = new URLSearchParams({
      search_query: options.query ? `${options.query} SKILL.md` : 'SKILL.md',
      page: String(options.page),
      pagelen: String(options.perPage),
    });

    try {
      const response = await this.http.fetchJson(`/search/code?${params}`, BitbucketSearchSchema, signal);

      const seen = new Set<string>();
      const skills: ExternalSkill[] = [];
      for (const result of response.values) {
        if (!result.file.path.endsWith('SKILL.md')) continue;
        const repoKey = repoFullName(result);
        if (seen.has(repoKey)) continue;
        seen.add(repoKey);
        skills.push(toExternalSkill(result));
      }

      return {
        skills,
        total: response.size,
        page: options.page,
        perPage: options.perPage,
        searchTimeMs: 0,
        source: this.name,
      };
    } catch (err) {
      if (err instanceof SourceApiError) return this.empty(options);
      throw err;
    }
  }

  async getSkill(id: string, signal?: AbortSignal): Promise<ExternalSkill | null> {
    const segments = idSegments(id);
    if (!segments || segments.length < 2) return null;
    const [workspace, repo, ...rest] = segments;
    const path = rest.length > 0 ? rest.join('/') : 'SKILL.md';

    let content: string;
    try {
      content = await this.http.fetchText(`/repositories/${encodePath([workspace, repo, 'src', 'main', ...path.split('/')])}`, { signal });
    } catch (err) {
      if (isApiStatus(err, 404)) return null;
      throw err;
    }

    return {
      id,
      slug: `${workspace}-${repo}`,
      name: `${workspace}/${repo}`,
      description: '',
      content,
      source: this.name,
      sourceUrl: `https://bitbucket.org/${workspace}/${repo}/src/main/${path}`,
      repoOwner: workspace,
      repoName: repo,
    };
  }
}

function repoFullName(result: BitbucketCodeResult): string {
  const repo = result.file.commit.repository;
  return repo.full_name || repo.name;
}

function toExternalSkill(result: BitbucketCodeResult): ExternalSkill {
  const repo = result.file.commit.repository;
  const fullName = repoFullName(result);
  const htmlUrl = repo.links?.html?.href ?? `https://bitbucket.org/${fullName}`;

  return {
    id: `${fullName}/${result.file.path}`,
    slug: fullName.replace(/\//g, '-'),
    name: fullName,
    description: '',
    source: SOURCE_TYPES.bitbucket,
    sourceUrl: `${htmlUrl}/src/main/${result.file.path}`,
    repoName: repo.name,
  };
}
