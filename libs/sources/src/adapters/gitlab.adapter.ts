/**
 * GitLabSource — SKILL.md blobs found through GitLab search
 *
 * Skill ids are `projectId[/path]`. Search keeps one skill per project.
 */

import { z } from 'zod';
import type { ExternalSkill, SearchOptions, SearchResult } from '@skillforge/ipc';
import { SOURCE_TYPES } from '@skillforge/ipc';
import { SourceApiError } from '../errors';
import { isApiStatus } from './http-client';
import { RemoteSource } from './remote-source';
import type { RemoteSourceOptions } from './remote-source';

export const GITLAB_API_URL = 'https://gitlab.com/api/v4';

const GitLabBlobSchema = z.object({
  filename: z.string(),
  path: z.string(),
  ref: z.string().optional(),
  project_id: z.number(),
});

const GitLabProjectSchema = z.object({
  id: z.number(),
  name: z.string(),
  description: z.string().nullish(),
  path_with_namespace: z.string(),
  web_url: z.string(),
  star_count: z.number().optional(),
  default_branch: z.string().nullish(),
});

type GitLabBlob = z.infer<typeof GitLabBlobSchema>;
type GitLabProject = z.infer<typeof GitLabProjectSchema>;

export interface GitLabSourceOptions extends RemoteSourceOptions {
  token?: string;
}

export class GitLabSource extends RemoteSource {
  readonly name = SOURCE_TYPES.gitlab;

  constructor(options?: GitLabSourceOptions) {
    super({
      source: SOURCE_TYPES.gitlab,
      baseUrl: options?.baseUrl ?? GITLAB_API_URL,
      timeoutMs: options?.timeoutMs,
      headers: {
        Accept: 'application/json',
        ...(options?.token ? { 'PRIVATE-TOKEN': options.token } : {}),
      },
    });
  }

  async search(options: SearchOptions, signal?: AbortSignal): Promise<SearchResult> {
    const params = new URLSearchParams({
      scope: 'blobs',
      search: options.query ? `${options.query} SKILL.md` : 'SKILL.md',
      page: String(options.page),
      per_page: String(options.perPage),
    });

    let blobs: GitLabBlob[];
    try {
      blobs = await this.http.fetchJson(`/search?${params}`, z.array(GitLabBlobSchema), signal);
    } catch (err) {
      if (err instanceof SourceApiError) return this.empty(options);
      throw err;
    }

    const seen = new Set<number>();
    const skills: ExternalSkill[] = [];
    for (const blob of blobs) {
      if (!blob.filename.endsWith('SKILL.md') || seen.has(blob.project_id)) continue;
      seen.add(blob.project_id);
      skills.push(await this.blobToSkill(blob, signal));
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
    const slash = id.indexOf('/');
    const projectId = slash === -1 ? id : id.slice(0, slash);
    const path = slash === -1 ? 'SKILL.md' : id.slice(slash + 1);
    if (!projectId) return null;

    const project = await this.getProject(projectId, signal);
    if (!project) return null;

    const ref = project.default_branch || 'main';
    const content = await this.http.fetchText(
      `/projects/${encodeURIComponent(projectId)}/repository/files/${encodeURIComponent(path)}/raw?ref=${encodeURIComponent(ref)}`,
      { signal },
    );

    return {
      id,
      slug: project.path_with_namespace.replace(/\//g, '-'),
      name: project.path_with_namespace,
      description: project.description ?? '',
      content,
      source: this.name,
      sourceUrl: `${project.web_url}/-/blob/${ref}/${path}`,
      stars: project.star_count ?? 0,
    };
  }

  private async getProject(projectId: string, signal?: AbortSignal): Promise<GitLabProject | null> {
    try {
      return await this.http.fetchJson(`/projects/${encodeURIComponent(projectId)}`, GitLabProjectSchema, signal);
    } catch (err) {
      if (isApiStatus(err, 404)) return null;
      throw err;
    }
  }

  /** Enrich a blob with its project; a bare skill stands in when the lookup fails */
  private async blobToSkill(blob: GitLabBlob, signal?: AbortSignal): Promise<ExternalSkill> {
    const id = `${blob.project_id}/${blob.path}`;

    let project: GitLabProject | null = null;
    try {
      project = await this.getProject(String(blob.project_id), signal);
    } catch (err) {
      if (signal?.aborted) throw err;
    }

    if (!project) {
      return {
        id,
        slug: `gitlab-${blob.project_id}`,
        name: blob.filename,
        description: '',
        source: this.name,
        sourceUrl: `https://gitlab.com/projects/${blob.project_id}`,
      };
    }

    return {
      id,
      slug: project.path_with_namespace.replace(/\//g, '-'),
      name: project.path_with_namespace,
      description: project.description ?? '',
      source: this.name,
      sourceUrl: `${project.web_url}/-/blob/${blob.ref ?? project.default_branch ?? 'main'}/${blob.path}`,
      stars: project.star_count ?? 0,
    };
  }
}
