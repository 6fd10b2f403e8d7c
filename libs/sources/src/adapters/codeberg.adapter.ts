/**
 * CodebergSource — Codeberg (Gitea) repositories that carry a root SKILL.md
 *
 * Skill ids are `owner/repo`.
 */

import { z } from 'zod';
import type { ExternalSkill, SearchOptions, SearchResult } from '@skillforge/ipc';
import { SOURCE_TYPES } from '@skillforge/ipc';
import { SourceApiError } from '../errors';
import { decodeBase64, encodePath, idSegments, isApiStatus } from './http-client';
import { RemoteSource } from './remote-source';
import type { RemoteSourceOptions } from './remote-source';

export const CODEBERG_API_URL = 'https://codeberg.org/api/v1';

const CodebergRepoSchema = z.object({
  name: z.string(),
  full_name: z.string(),
  description: z.string().nullish(),
  html_url: z.string().optional(),
  stars_count: z.number().optional(),
  default_branch: z.string().nullish(),
  owner: z.object({ login: z.string() }),
});

const CodebergSearchSchema = z.object({
  ok: z.boolean().optional(),
  data: z.array(CodebergRepoSchema),
});

const CodebergContentSchema = z.object({
  content: z.string().nullish(),
  encoding: z.string().nullish(),
});

type CodebergRepo = z.infer<typeof CodebergRepoSchema>;

export interface CodebergSourceOptions extends RemoteSourceOptions {
  token?: string;
}

export class CodebergSource extends RemoteSource {
  readonly name = SOURCE_TYPES.codeberg;

  constructor(options?: CodebergSourceOptions) {
    super({
      source: SOURCE_TYPES.codeberg,
      baseUrl: options?.baseUrl ?? CODEBERG_API_URL,
      timeoutMs: options?.timeoutMs,
      headers: {
        Accept: 'application/json',
        ...(options?.token ? { Authorization: `token ${options.token}` } : {}),
      },
    });
  }

  async search(options: SearchOptions, signal?: AbortSignal): Promise<SearchResult> {
    const params = new URLSearchParams({
      q: options.query || 'skill',
      page: String(options.page),
      limit: String(options.perPage),
    });

    let repos: CodebergRepo[];
    try {
      repos = (await this.http.fetchJson(`/repos/search?${params}`, CodebergSearchSchema, signal)).data;
    } catch (err) {
      if (err instanceof SourceApiError) return this.empty(options);
      throw err;
    }

    const skills: ExternalSkill[] = [];
    for (const repo of repos) {
      if (await this.hasSkillFile(repo, signal)) skills.push(toExternalSkill(repo));
    }

    return {
      skills,
      total: skills.length,
      page: options.page,
      perPage: options.perPage,
      searchTimeMs: 0,
      source: this.name,
    };
  }

  async getSkill(id: string, signal?: AbortSignal): Promise<ExternalSkill | null> {
    const segments = idSegments(id);
    if (!segments || segments.length !== 2) return null;
    const [owner, repo] = segments;

    let info: CodebergRepo;
    try {
      info = await this.http.fetchJson(`/repos/${encodePath([owner, repo])}`, CodebergRepoSchema, signal);
    } catch (err) {
      if (isApiStatus(err, 404)) return null;
      throw err;
    }

    const branch = info.default_branch || 'main';
    const file = await this.http.fetchJson(
      `/repos/${encodePath([owner, repo])}/contents/SKILL.md?ref=${encodeURIComponent(branch)}`,
      CodebergContentSchema,
      signal,
    );
    const raw = file.content ?? '';

    return {
      id,
      slug: `${owner}-${repo}`,
      name: info.full_name,
      description: info.description ?? '',
      content: file.encoding === 'base64' ? decodeBase64(raw) : raw,
      source: this.name,
      sourceUrl: `https://codeberg.org/${owner}/${repo}/src/branch/${branch}/SKILL.md`,
      repoOwner: owner,
      repoName: repo,
      stars: info.stars_count ?? 0,
    };
  }

  /** HEAD probe for a root SKILL.md; any failure other than an abort counts as absent */
  private async hasSkillFile(repo: CodebergRepo, signal?: AbortSignal): Promise<boolean> {
    const branch = repo.default_branch || 'main';
    try {
      const status = await this.http.probe(
        `/repos/${repo.owner.login}/${repo.name}/contents/SKILL.md?ref=${encodeURIComponent(branch)}`,
        signal,
      );
      return status === 200;
    } catch (err) {
      if (signal?.aborted) throw err;
      return false;
    }
  }
}

function toExternalSkill(repo: CodebergRepo): ExternalSkill {
  const branch = repo.default_branch || 'main';
  return {
    id: repo.full_name,
    slug: repo.full_name.replace(/\//g, '-'),
    name: repo.full_name,
    description: repo.description ?? '',
    source: SOURCE_TYPES.codeberg,
    sourceUrl: `https://codeberg.org/${repo.full_name}/src/branch/${branch}/SKILL.md`,
    repoOwner: repo.owner.login,
    repoName: repo.name,
    stars: repo.stars_count ?? 0,
  };
}
