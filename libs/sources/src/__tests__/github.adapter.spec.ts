/**
 * GitHubSource tests
 */

import { GitHubSource } from '../adapters/github.adapter';
import { SourceDecodeError, SourceRequestError } from '../errors';
import { base64, headersOf, serve } from './helpers';

const API = 'https://api.github.com';

const codeItem = {
  name: 'SKILL.md',
  path: 'skills/pdf/SKILL.md',
  html_url: 'https://github.com/acme/pdf-tools/blob/main/skills/pdf/SKILL.md',
  url: `${API}/repositories/1/contents/skills/pdf/SKILL.md`,
  repository: {
    name: 'pdf-tools',
    full_name: 'acme/pdf-tools',
    description: null,
    stargazers_count: 42,
    owner: { login: 'acme' },
  },
};

describe('GitHubSource', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('is enabled by default and can be toggled', () => {
    const source = new GitHubSource();
    expect(source.name).toBe('github');
    expect(source.isEnabled()).toBe(true);
    source.setEnabled(false);
    expect(source.isEnabled()).toBe(false);
  });

  describe('search', () => {
    it('queries code search for SKILL.md files and maps the hits', async () => {
      const url = `${API}/search/code?q=pdf+filename%3ASKILL.md&page=2&per_page=10`;
      const spy = serve({ [url]: { json: { total_count: 31, items: [codeItem] } } });

      const result = await new GitHubSource({ token: 'test-secret' }).search({ query: 'pdf', page: 2, perPage: 10 });

      expect(spy).toHaveBeenCalledTimes(1);
      expect(headersOf(spy)).toMatchObject({
        Authorization: 'Bearer test-secret',
        Accept: 'application/vnd.github.v3+json',
        'User-Agent': 'SkillForge/1.0',
      });
      expect(result).toMatchObject({ total: 31, page: 2, perPage: 10, source: 'github' });
      expect(result.skills).toEqual([
        {
          id: 'acme/pdf-tools/skills/pdf/SKILL.md',
          slug: 'acme-pdf-tools',
          name: 'acme/pdf-tools',
          description: '',
          source: 'github',
          sourceUrl: codeItem.html_url,
          contentUrl: codeItem.url,
          repoOwner: 'acme',
          repoName: 'pdf-tools',
          stars: 42,
        },
      ]);
    });

    it('searches every SKILL.md when the query is empty', async () => {
      const spy = serve({});
      await new GitHubSource().search({ query: '', page: 1, perPage: 20 });
      expect(spy.mock.calls[0][0]).toBe(`${API}/search/code?q=filename%3ASKILL.md&page=1&per_page=20`);
    });

    it('omits the authorization header without a token', async () => {
      const spy = serve({});
      await new GitHubSource().search({ query: '', page: 1, perPage: 20 });
      expect(headersOf(spy)).not.toHaveProperty('Authorization');
    });

    it.each([401, 403, 500])('returns an empty result on HTTP %i', async (status) => {
      serve({ [`${API}/search/code?q=filename%3ASKILL.md&page=1&per_page=20`]: { status, text: 'nope' } });

      const result = await new GitHubSource().search({ query: '', page: 1, perPage: 20 });

      expect(result).toEqual({ skills: [], total: 0, page: 1, perPage: 20, searchTimeMs: 0, source: 'github' });
    });

    it('rejects on a malformed body', async () => {
      serve({ [`${API}/search/code?q=filename%3ASKILL.md&page=1&per_page=20`]: { json: { items: 'nope' } } });

      await expect(new GitHubSource().search({ query: '', page: 1, perPage: 20 })).rejects.toBeInstanceOf(
        SourceDecodeError,
      );
    });

    it('rejects on a transport failure', async () => {
      jest.spyOn(globalThis, 'fetch').mockRejectedValue(new TypeError('fetch failed'));

      await expect(new GitHubSource().search({ query: '', page: 1, perPage: 20 })).rejects.toBeInstanceOf(
        SourceRequestError,
      );
    });
  });

  describe('getSkill', () => {
    it('returns null for an id without a repository', async () => {
      const spy = serve({});
      expect(await new GitHubSource().getSkill('acme')).toBeNull();
      expect(spy).not.toHaveBeenCalled();
    });

    it('returns null for ids with empty or dot segments without calling the API', async () => {
      const spy = serve({});
      const github = new GitHubSource();

      expect(await github.getSkill('a/b/../../../search/code')).toBeNull();
      expect(await github.getSkill('acme/./SKILL.md')).toBeNull();
      expect(await github.getSkill('acme//SKILL.md')).toBeNull();
      expect(spy).not.toHaveBeenCalled();
    });

    it('percent-encodes id segments in the request path', async () => {
      const spy = serve({});

      expect(await new GitHubSource().getSkill('acme/pdf tools/SKILL.md')).toBeNull();
      expect(String(spy.mock.calls[0]?.[0])).toBe(`${API}/repos/acme/pdf%20tools/contents/SKILL.md`);
    });

    it('reads SKILL.md and repository stars', async () => {
      serve({
        [`${API}/repos/acme/pdf-tools/contents/SKILL.md`]: { json: { content: base64('# PDF'), encoding: 'base64' } },
        [`${API}/repos/acme/pdf-tools`]: {
          json: { name: 'pdf-tools', full_name: 'acme/pdf-tools', description: 'PDF helpers', stargazers_count: 7 },
        },
      });

      const skill = await new GitHubSource().getSkill('acme/pdf-tools');

      expect(skill).toEqual({
        id: 'acme/pdf-tools',
        slug: 'acme-pdf-tools',
        name: 'acme/pdf-tools',
        description: 'PDF helpers',
        content: '# PDF',
        source: 'github',
        sourceUrl: 'https://github.com/acme/pdf-tools/blob/main/SKILL.md',
        repoOwner: 'acme',
        repoName: 'pdf-tools',
        stars: 7,
      });
    });

    it('reads a nested path from the id', async () => {
      const spy = serve({
        [`${API}/repos/acme/pdf-tools/contents/skills/pdf/SKILL.md`]: { json: { content: base64('nested') } },
      });

      const skill = await new GitHubSource().getSkill('acme/pdf-tools/skills/pdf/SKILL.md');

      expect(skill?.content).toBe('nested');
      expect(skill?.sourceUrl).toBe('https://github.com/acme/pdf-tools/blob/main/skills/pdf/SKILL.md');
      expect(spy).toHaveBeenCalledTimes(2);
    });

    it('falls back to zero stars when repository info is unavailable', async () => {
      serve({ [`${API}/repos/acme/pdf-tools/contents/SKILL.md`]: { json: { content: base64('x') } } });

      const skill = await new GitHubSource().getSkill('acme/pdf-tools');

      expect(skill?.stars).toBe(0);
      expect(skill?.description).toBe('');
    });

    it('returns null when the file does not exist', async () => {
      serve({});
      expect(await new GitHubSource().getSkill('acme/missing')).toBeNull();
    });

    it('rejects on other upstream errors', async () => {
      serve({ [`${API}/repos/acme/pdf-tools/contents/SKILL.md`]: { status: 502, text: 'bad gateway' } });
      await expect(new GitHubSource().getSkill('acme/pdf-tools')).rejects.toMatchObject({
        code: 'SOURCE_API_ERROR',
        statusCode: 502,
      });
    });
  });

  describe('getContent', () => {
    it('returns populated content without a request', async () => {
      const spy = serve({});
      const content = await new GitHubSource().getContent({
        id: 'acme/pdf-tools',
        slug: 'acme-pdf-tools',
        name: 'acme/pdf-tools',
        description: '',
        content: 'already here',
        source: 'github',
        sourceUrl: '',
      });

      expect(content).toBe('already here');
      expect(spy).not.toHaveBeenCalled();
    });

    it('fetches the body through getSkill', async () => {
      serve({ [`${API}/repos/acme/pdf-tools/contents/SKILL.md`]: { json: { content: base64('# Body') } } });

      const content = await new GitHubSource().getContent({
        id: 'acme/pdf-tools',
        slug: 'acme-pdf-tools',
        name: 'acme/pdf-tools',
        description: '',
        source: 'github',
        sourceUrl: '',
      });

      expect(content).toBe('# Body');
    });
  });
});
