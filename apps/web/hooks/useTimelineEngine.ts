import { useCallback, useEffect, useMemo, useState } from 'react';
import type { EntityData } from '@strata/shared';
import { DEFAULT_TAG_COLOURS, parseTagColours } from '../lib/colours';
import { getTagColourConfig } from '../lib/env';
import { createCanvasTextMeasurer } from '../lib/measure-text';
import { anyTagFilter } from '../lib/tag-filter';
import { TimelineEngine } from '../lib/timeline-engine';

/**
 * Hook: Owns one TimelineEngine for the lifetime of the component.
 *
 * The engine is mutable and synchronous, so React never sees its state
 * directly. `notifyChange` re-renders the owner whenever something the UI
 * shows (zoom, counts, limits) may have changed; the canvas reads the engine
 * every frame anyway.
 */
export function useTimelineEngine(entities: EntityData[], filterTags: string[]) {
  const tagColours = useMemo(() => [...parseTagColours(getTagColourConfig()), ...DEFAULT_TAG_COLOURS], []);
  const engine = useMemo(
    () => new TimelineEngine({ measureText: createCanvasTextMeasurer(), tagColours }),
    [tagColours]
  );
  const [, setRevision] = useState(0);
  const notifyChange = useCallback(() => setRevision((r) => r + 1), []);

  useEffect(() => {
    engine.setEntities(entities);
    notifyChange();
  }, [engine, entities, notifyChange]);

  // Join so a new array with the same tags doesn't re-run the filter
  const filterKey = filterTags.join('\u0000');
  useEffect(() => {
    const tags = filterKey ? filterKey.split('\u0000') : [];
    if (tags.length > 0) {
      engine.setTagExprEntityFilter(anyTagFilter(tags));
    } else {
      engine.removeTagExprEntityFilter();
    }
    notifyChange();
  }, [engine, filterKey, notifyChange]);

  return { engine, tagColours, notifyChange };
}
