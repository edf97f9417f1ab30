import useSWR from 'swr';
import { createLogger, parseEntityList } from '@strata/shared';
import type { EntityData } from '@strata/shared';

const log = createLogger('useEntityData');

const NO_ENTITIES: EntityData[] = [];

const fetcher = async (url: string): Promise<EntityData[]> => {
  const res = await fetch(url);
  if (!res.ok) {
    throw new Error(`API Error: ${res.status}`);
  }

  // Invalid payloads are logged by the parser and come back empty
  const rawData: unknown = await res.json();
  return parseEntityList(rawData);
};

/**
 * Hook: Loads the timeline's entities.
 * The list is fetched once; the engine does all filtering client-side.
 */
export function useEntityData(enabled: boolean = true) {
  const { data, error, isLoading } = useSWR<EntityData[], Error>(enabled ? '/api/entities' : null, fetcher, {
    revalidateOnFocus: false,
    onError: (err) => log.error('Fetch Error:', err),
  });

  return {
    entities: data ?? NO_ENTITIES,
    isLoading,
    isError: !!error,
  };
}
