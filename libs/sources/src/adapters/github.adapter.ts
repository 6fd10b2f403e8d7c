/**
 * GitHubSource — SKILL.md files found through GitHub code search
 *
 * Skill ids are `owner/repo[/path]`; the path defaults to `SKILL.md`.
 */

import { z } from 'zod';
import type { ExternalSkill, SearchOptions, SearchResult } from '@skillforge/ipc';
import { SOURCE_TYPES } from '@skillforge/ipc';
import { SourceApiError } from '../errors';
import { decodeBase64, encodePath, idSegments, isApiStatus } from './http-client';
import { RemoteSource } from './remote-source';
import type { RemoteSourceOptions } from './remote-source';

export const GITHUB_API_URL = 'https://api.github.com';

const GitHubRepoSchema = z.object({
  name: z.string(),
  full_name: z.string(),
  description: z.string().nullish(),
  html_url: z.string().optional(),
  stargazers_count: z.number().optional(),
  owner: z.object({ login: z.string() }).optional(),
});

const GitHubCodeItemSchema = z.object({
  name: z.string(),
  path: z.string(),
  html_url: z.string(),
  url: z.string(),
  repository: GitHubRepoSchema,
});

const GitHubSearchSchema = z.object({
  total_count: z.number(),
  items: z.array(GitHubCodeItemSchema),
});

const GitHubContentSchema = z.object({
  content: z.string(),
  encoding: z.string().optional(),
});

type GitHubRepo = z.infer<typeof GitHubRepoSchema>;
type GitHubCodeItem = z.infer<typeof GitHubCodeItemSchema>;

export interface GitHubSourceOptions extends RemoteSourceOptions {
  token?: string;
}

export class GitHubSource extends RemoteSource {
  readonly name = SOURCE_TYPES.github;

  constructor(options?: GitHubSourceOptions) {
    super({
      source: SOURCE_TYPES.github,
      baseUrl: options?.baseUrl ?? GITHUB_API_URL,
      timeoutMs: options?.timeoutMs,
      headers: {
        Accept: 'application/vnd.github.v3+json',
        ...(options?.token ? { Authorization: `Bearer ${options.token}` } : {}),
      },
    });
  }

  async search(options: SearchOptions, signal?: AbortSignal): Promise<SearchResult> {
    const q = options.query ? `${options.query} filename:SKILL.md` : 'filename:SKILL.md';
    const params = new URLSearchParams({
      q,
      page: String(options.page),
      per_page: String(options.perPage),
    });

    try {
      const response = await this.http.fetchJson(`/search/code?${params}`, GitHubSearchSchema, signal);
      return {
        skills: response.items.map(toExternalSkill),
        total: response.total_count,
        page: options.page,
        perPage: options.perPage,
        searchTimeMs: 0,
        source: this.name,
      };
    } catch (err) {
      // Rejected credentials and search throttling surface as non-2xx
      if (err instanceof SourceApiError) return this.empty(options);
      throw err;
    }
  }

  async getSkill(id: string, signal?: AbortSignal): Promise<ExternalSkill | null> {
    const segments = idSegments(id);
    if (!segments || segments.length < 2) return null;
    const [owner, repo, ...rest] = segments;
    const path = rest.length > 0 ? rest.join('/') : 'SKILL.md';

    let file: z.infer<typeof GitHubContentSchema>;
    try {
      file = await this.http.fetchJson(`/repos/${encodePath([owner, repo, 'contents', ...path.split('/')])}`, GitHubContentSchema, signal);
    } catch (err) {
      if (isApiStatus(err, 404)) return null;
      throw err;
    }

    const info = await this.getRepoInfo(owner, repo, signal);

    return {
      id,
      slug: `${owner}-${repo}`,
      name: `${owner}/${repo}`,
      description: info?.description ?? '',
      content: decodeBase64(file.content),
      source: this.name,
      sourceUrl: `https://github.com/${owner}/${repo}/blob/main/${path}`,
      repoOwner: owner,
      repoName: repo,
      stars: info?.stargazers_count ?? 0,
    };
  }

  /** Repository metadata for stars and description; `null` when unavailable */
  private async getRepoInfo(owner: string, repo: string, signal?: AbortSignal): Promise<GitHubRepo | null> {
    try {
      return await this.http.fetchJson(`/repos/${encodePath([owner, repo])}`, GitHubRepoSchema, signal);
    } catch (err) {
      if (signal?.aborted) throw err;
      return null;
    }
  }
}

function toExternalSkill(item: GitHubCodeItem): ExternalSkill {
  const repo = item.repository;
  return {
    id: `${repo.full_name}/${item.path}`,
    slug: repo.full_name.replace(/\//g, '-'),
    name: repo.full_name,
    description: repo.description ?? '',
    source: SOURCE_TYPES.github,
    sourceUrl: item.html_url,
    contentUrl: item.url,
    repoOwner: repo.owner?.login,
    repoName: repo.name,
    stars: repo.stargazers_count ?? 0,
  };
}
