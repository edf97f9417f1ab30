import { createLogger, EntityListSchema } from '@strata/shared';
import type { EntityData } from '@strata/shared';

/**
 * lib/entity-source.ts
 * Server-Side Entity Loading
 * ------------------------------------------------------------------
 * Validates the bundled entity list before the API hands it out, so a
 * malformed fixture fails loudly on the server instead of rendering an
 * empty timeline.
 */

const log = createLogger('EntitySource');

export type EntityLoadResult = { ok: true; entities: EntityData[] } | { ok: false; error: string };

export function loadEntities(raw: unknown): EntityLoadResult {
  const result = EntityListSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const error = issue ? `${issue.path.join('.')}: ${issue.message}` : 'Invalid entity list';
    log.error('Entity list rejected', error);
    return { ok: false, error };
  }

  // Ids key selection and hover, so a duplicate would make two boxes act as one
  const seen = new Set<string>();
  for (const entity of result.data) {
    if (seen.has(entity.id)) {
      const error = `Duplicate entity id: ${entity.id}`;
      log.error('Entity list rejected', error);
      return { ok: false, error };
    }
    seen.add(entity.id);
  }

  log.debug('Entity list loaded', { count: result.data.length });
  return { ok: true, entities: result.data };
}
