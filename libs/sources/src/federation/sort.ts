import type { ExternalSkill, SourceType } from '@skillforge/ipc';
import { SOURCE_TYPES } from '@skillforge/ipc';

/**
 * Presentation order: local skills first, then by stars descending, then by
 * name ascending (code point order).
 */
export function compareSkills(a: ExternalSkill, b: ExternalSkill, localSource: SourceType = SOURCE_TYPES.local): number {
  const aLocal = a.source === localSource;
  const bLocal = b.source === localSource;
  if (aLocal !== bLocal) return aLocal ? -1 : 1;

  const byStars = (b.stars ?? 0) - (a.stars ?? 0);
  if (byStars !== 0) return byStars;

  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/** Stable in-place sort; equal keys keep their relative order */
export function sortSkills(skills: ExternalSkill[], localSource?: SourceType): ExternalSkill[] {
  return skills.sort((a, b) => compareSkills(a, b, localSource));
}
