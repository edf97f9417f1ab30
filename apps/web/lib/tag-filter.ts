import type { EntityData } from '@strata/shared';
import type { EntityFilter } from '../types';

/**
 * Matches entities carrying at least one of the given tags.
 * Comparison ignores case and surrounding whitespace.
 */
export function anyTagFilter(tags: readonly string[]): EntityFilter {
  const wanted = new Set(tags.map(normalizeTag).filter((t) => t.length > 0));
  return {
    matches: (entity: EntityData) => (entity.tags ?? []).some((tag) => wanted.has(normalizeTag(tag))),
  };
}

export const normalizeTag = (tag: string): string => tag.trim().toLowerCase();

/** Every distinct tag in use, sorted, for building filter controls. */
export function collectTags(entities: readonly EntityData[]): string[] {
  const tags = new Set<string>();
  for (const entity of entities) {
    entity.tags?.forEach((tag) => tags.add(normalizeTag(tag)));
  }
  return [...tags].filter((t) => t.length > 0).sort();
}
