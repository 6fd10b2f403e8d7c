/**
 * SkillsShSource — the SKILLS.sh catalog, read from its GitHub repositories
 *
 * SKILLS.sh indexes skill directories of a handful of known repositories.
 * Each search lists those directories through the GitHub contents API,
 * reads every SKILL.md header, then filters and paginates locally.
 *
 * Skill ids are `owner/repo/path/to/SKILL.md`.
 */

import { z } from 'zod';
import type { ExternalSkill, SearchOptions, SearchResult } from '@skillforge/ipc';
import { SOURCE_TYPES } from '@skillforge/ipc';
import { decodeBase64, encodePath, idSegments, isApiStatus } from './http-client';
import { GITHUB_API_URL } from './github.adapter';
import { parseSkillFrontmatter } from './frontmatter';
import { RemoteSource } from './remote-source';
import type { RemoteSourceOptions } from './remote-source';

export const KNOWN_SKILL_REPOS: readonly string[] = ['vercel-labs/agent-skills', 'anthropics/anthropic-cookbook'];

/** Directory layouts a skill repository may use */
const SKILL_DIRS = ['skills', '.', 'packages'];

const ContentEntrySchema = z.object({
  name: z.string(),
  path: z.string().optional(),
  type: z.string(),
});

const FileContentSchema = z.object({
  content: z.string(),
  encoding: z.string().optional(),
});

export interface SkillsShSourceOptions extends RemoteSourceOptions {
  githubToken?: string;
  /** `owner/repo` list to index (default: KNOWN_SKILL_REPOS) */
  repositories?: readonly string[];
}

export class SkillsShSource extends RemoteSource {
  readonly name = SOURCE_TYPES.skillsSh;
  private readonly repositories: readonly string[];

  constructor(options?: SkillsShSourceOptions) {
    super({
      source: SOURCE_TYPES.skillsSh,
      baseUrl: options?.baseUrl ?? GITHUB_API_URL,
      timeoutMs: options?.timeoutMs,
      headers: {
        Accept: 'application/vnd.github.v3+json',
        ...(options?.githubToken ? { Authorization: `token ${options.githubToken}` } : {}),
      },
    });
    this.repositories = options?.repositories ?? KNOWN_SKILL_REPOS;
  }

  async search(options: SearchOptions, signal?: AbortSignal): Promise<SearchResult> {
    const matches: ExternalSkill[] = [];
    for (const repoPath of this.repositories) {
      const skills = await this.listRepoSkills(repoPath, signal);
      matches.push(...skills.filter((skill) => matchesQuery(skill, options.query) && hasTags(skill, options.tags)));
    }

    const start = (options.page - 1) * options.perPage;
    return {
      skills: matches.slice(start, start + options.perPage),
      total: matches.length,
      page: options.page,
      perPage: options.perPage,
      searchTimeMs: 0,
      source: this.name,
    };
  }

  async getSkill(id: string, signal?: AbortSignal): Promise<ExternalSkill | null> {
    const segments = idSegments(id);
    if (!segments || segments.length < 3) return null;
    const [owner, repo, ...rest] = segments;

    const filePath = rest.join('/');
    const dir = filePath.replace(/\/?SKILL\.md$/, '');
    const skillName = dir.slice(dir.lastIndexOf('/') + 1) || repo;

    try {
      return await this.readSkill(`${owner}/${repo}`, filePath, skillName, signal);
    } catch (err) {
      if (isApiStatus(err, 404)) return null;
      throw err;
    }
  }

  override async getContent(skill: ExternalSkill, signal?: AbortSignal): Promise<string> {
    if (skill.content) return skill.content;
    if (!skill.contentUrl) return '';
    // contentUrl comes from the skill object and may name any host
    return this.http.fetchText(skill.contentUrl, { headers: { Accept: 'text/plain' }, anonymous: true, signal });
  }

  /** Every skill found under the known layouts; unreadable entries are skipped */
  private async listRepoSkills(repoPath: string, signal?: AbortSignal): Promise<ExternalSkill[]> {
    const repo = repoPath.slice(repoPath.indexOf('/') + 1);
    const skills: ExternalSkill[] = [];

    for (const dir of SKILL_DIRS) {
      const entries = await this.skipOnFailure(
        () => this.http.fetchJson(`/repos/${repoPath}/contents${dir === '.' ? '' : `/${dir}`}`, z.array(ContentEntrySchema), signal),
        signal,
      );

      for (const entry of entries ?? []) {
        let filePath: string | null = null;
        let skillName = entry.name;
        if (entry.type === 'dir') {
          filePath = dir === '.' ? `${entry.name}/SKILL.md` : `${dir}/${entry.name}/SKILL.md`;
        } else if (entry.name === 'SKILL.md' && dir === '.') {
          filePath = 'SKILL.md';
          skillName = repo;
        }
        if (!filePath) continue;

        const path = filePath;
        const skill = await this.skipOnFailure(() => this.readSkill(repoPath, path, skillName, signal), signal);
        if (skill) skills.push(skill);
      }
    }

    return skills;
  }

  private async readSkill(repoPath: string, filePath: string, skillName: string, signal?: AbortSignal): Promise<ExternalSkill> {
    const file = await this.http.fetchJson(`/repos/${encodePath([...repoPath.split('/'), 'contents', ...filePath.split('/')])}`, FileContentSchema, signal);
    const content = decodeBase64(file.content);
    const meta = parseSkillFrontmatter(content, skillName);
    const [owner, repo] = repoPath.split('/');

    return {
      id: `${repoPath}/${filePath}`,
      slug: skillName,
      name: meta.name,
      description: meta.description,
      content,
      ...(meta.tags.length > 0 ? { tags: meta.tags } : {}),
      source: this.name,
      sourceUrl: `https://skills.sh/${owner}/${repo}/${skillName}`,
      contentUrl: `https://raw.githubusercontent.com/${repoPath}/main/${filePath}`,
      repoOwner: owner,
      repoName: repo,
    };
  }

  /** Missing directories and unreadable files are expected; cancellation is not */
  private async skipOnFailure<T>(load: () => Promise<T>, signal?: AbortSignal): Promise<T | null> {
    try {
      return await load();
    } catch (err) {
      if (signal?.aborted) throw err;
      return null;
    }
  }
}

function matchesQuery(skill: ExternalSkill, query: string): boolean {
  const q = query.toLowerCase();
  if (!q) return true;
  return (
    skill.name.toLowerCase().includes(q) ||
    skill.description.toLowerCase().includes(q) ||
    skill.slug.toLowerCase().includes(q) ||
    (skill.tags ?? []).some((tag) => tag.toLowerCase().includes(q))
  );
}

/** Every requested tag must be present (case-insensitive) */
function hasTags(skill: ExternalSkill, tags?: string[]): boolean {
  if (!tags || tags.length === 0) return true;
  const own = new Set((skill.tags ?? []).map((t) => t.toLowerCase()));
  return tags.every((tag) => own.has(tag.toLowerCase()));
}
