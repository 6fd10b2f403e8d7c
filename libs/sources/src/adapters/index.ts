export { HttpSourceClient, USER_AGENT, DEFAULT_REQUEST_TIMEOUT_MS, MAX_CONTENT_BYTES, idSegments, encodePath } from './http-client';
export type { HttpSourceClientOptions, RequestOptions } from './http-client';
export { RemoteSource } from './remote-source';
export type { RemoteSourceOptions } from './remote-source';
export { LocalSource } from './local.adapter';
export type { StoredSkill, SkillPage, SkillRegistry } from './local.adapter';
export { GitHubSource, GITHUB_API_URL } from './github.adapter';
export type { GitHubSourceOptions } from './github.adapter';
export { GitLabSource, GITLAB_API_URL } from './gitlab.adapter';
export type { GitLabSourceOptions } from './gitlab.adapter';
export { BitbucketSource, BITBUCKET_API_URL } from './bitbucket.adapter';
export type { BitbucketSourceOptions } from './bitbucket.adapter';
export { CodebergSource, CODEBERG_API_URL } from './codeberg.adapter';
export type { CodebergSourceOptions } from './codeberg.adapter';
export { SkillsShSource, KNOWN_SKILL_REPOS } from './skillssh.adapter';
export type { SkillsShSourceOptions } from './skillssh.adapter';
export { parseSkillFrontmatter } from './frontmatter';
export type { SkillFrontmatter } from './frontmatter';
