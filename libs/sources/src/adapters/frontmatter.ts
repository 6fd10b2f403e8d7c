/**
 * SKILL.md frontmatter extraction
 */

import { parse as parseYaml } from 'yaml';

/** YAML frontmatter delimited by --- */
const FRONTMATTER_RE = /^---\s*\n([\s\S]*?)\n---\s*\n?([\s\S]*)$/;

export interface SkillFrontmatter {
  name: string;
  description: string;
  tags: string[];
}

function readTags(value: unknown): string[] {
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((t) => t.trim())
      .filter(Boolean);
  }
  if (Array.isArray(value)) {
    return value.filter((t): t is string => typeof t === 'string' && t.length > 0);
  }
  return [];
}

/**
 * Read `name`, `description` and `tags` from a SKILL.md header.
 * Missing or unparseable frontmatter yields the fallback name and no metadata.
 */
export function parseSkillFrontmatter(content: string, fallbackName: string): SkillFrontmatter {
  const result: SkillFrontmatter = { name: fallbackName, description: '', tags: [] };

  const match = content.replace(/\r\n/g, '\n').match(FRONTMATTER_RE);
  if (!match) return result;

  let metadata: unknown;
  try {
    metadata = parseYaml(match[1]);
  } catch {
    return result; // YAML parse failure, metadata ignored
  }
  if (!metadata || typeof metadata !== 'object') return result;

  const fields: Record<string, unknown> = { ...metadata };
  if (typeof fields.name === 'string' && fields.name.trim()) result.name = fields.name.trim();
  if (typeof fields.description === 'string') result.description = fields.description.trim();
  result.tags = readTags(fields.tags);

  return result;
}
