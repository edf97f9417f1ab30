/**
 * app/api/entities/route.ts
 *
 * ADAPTER LAYER (DATA <=> APPLICATION)
 * ------------------------------------------------------------------
 * Serves the timeline's entity list. The data is a bundled JSON file;
 * it is validated against the canonical schema on every request.
 */

import { NextResponse } from 'next/server';
import demoEntities from '../../../data/demo-entities.json';
import { loadEntities } from '../../../lib/entity-source';

export async function GET() {
  const result = loadEntities(demoEntities);

  if (!result.ok) {
    return NextResponse.json({ error: result.error }, { status: 500 });
  }

  return NextResponse.json(result.entities, {
    headers: {
      'Cache-Control': 'public, s-maxage=60, stale-while-revalidate=600',
    },
  });
}
