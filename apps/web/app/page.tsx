"use client";

import React, { Suspense, useCallback, useMemo, useState } from 'react';
import { useSearchParams } from 'next/navigation';
import { Loader2, Tag, X } from 'lucide-react';
import { formatDateRange } from '@strata/shared';
import type { EntityId } from '@strata/shared';

import { TimelineCanvas } from '../components/timeline/TimelineCanvas';
import { TimelineZoomControls } from '../components/timeline/parts/TimelineZoomControls';
import { DebugHUD } from '../components/debug/DebugHUD';
import { useAppConfig } from '../hooks/useAppConfig';
import { useEntityData } from '../hooks/useEntityData';
import { useTimelineEngine } from '../hooks/useTimelineEngine';
import { colourToHex, tagColourFor } from '../lib/colours';
import { collectTags } from '../lib/tag-filter';
import type { TimelineInteractionEvent } from '../types';

function TimelineContent() {
  // --- 1. Infrastructure & Config ---
  const searchParams = useSearchParams();
  const { showDebugHud } = useAppConfig(searchParams.get('debug'));

  // --- 2. Data ---
  const { entities, isLoading, isError } = useEntityData();
  const entitiesById = useMemo(() => new Map(entities.map((e) => [e.id, e])), [entities]);
  const allTags = useMemo(() => collectTags(entities), [entities]);

  // --- 3. Engine ---
  const [filterTags, setFilterTags] = useState<string[]>([]);
  const { engine, tagColours, notifyChange } = useTimelineEngine(entities, filterTags);

  const [selectedId, setSelectedId] = useState<EntityId | null>(null);

  const toggleTag = (tag: string) => {
    setFilterTags((prev) => (prev.includes(tag) ? prev.filter((t) => t !== tag) : [...prev, tag]));
  };

  // --- 4. Interaction ---
  const showAllDates = useCallback(() => {
    engine.setDateLimits(null, null);
    notifyChange();
  }, [engine, notifyChange]);

  const handleInteraction = useCallback(
    (event: TimelineInteractionEvent) => {
      switch (event.type) {
        case 'single-click':
          engine.selectEntities([event.entityId]);
          setSelectedId(event.entityId);
          break;
        case 'double-click': {
          // Focus the timeline on the entity's own span
          const entity = entitiesById.get(event.entityId);
          if (entity) engine.setDateLimits(entity.start, entity.end ?? null);
          break;
        }
        case 'triple-click':
          showAllDates();
          break;
        case 'hover':
          // The canvas already draws the highlight
          break;
      }
      notifyChange();
    },
    [engine, entitiesById, notifyChange, showAllDates]
  );

  const clearSelection = () => {
    engine.selectEntities([]);
    setSelectedId(null);
    notifyChange();
  };

  const selected = selectedId ? entitiesById.get(selectedId) : undefined;
  const limits = engine.dateLimits();
  const isFocused = limits.start !== null || limits.end !== null;

  return (
    <div className="flex flex-col h-screen w-full bg-slate-50 font-sans text-slate-900 overflow-hidden relative selection:bg-blue-100">
      {showDebugHud && <DebugHUD engine={engine} />}

      {/* Header */}
      <header className="flex items-center gap-4 px-6 py-3 border-b border-slate-200 bg-white/80 backdrop-blur-md z-10">
        <h1 className="text-lg font-bold tracking-tight">Strata</h1>

        <div className="flex items-center gap-1.5 flex-wrap">
          <Tag size={14} className="text-slate-400" />
          {allTags.map((tag) => {
            const colour = tagColourFor([tag], tagColours);
            return (
              <button
                key={tag}
                onClick={() => toggleTag(tag)}
                className={`flex items-center gap-1 px-2 py-0.5 rounded-full text-xs font-medium border transition-colors ${
                  filterTags.includes(tag)
                    ? 'bg-blue-100 text-blue-700 border-blue-200'
                    : 'bg-white text-slate-600 border-slate-200 hover:bg-slate-100'
                }`}
              >
                {colour && <span className="w-2 h-2 rounded-full" style={{ backgroundColor: colourToHex(colour) }} />}
                {tag}
              </button>
            );
          })}
        </div>

        <div className="ml-auto text-xs text-slate-500 font-mono">
          {engine.visibleEntityCount()} / {engine.entityCount()} entities
          {isFocused && (
            <button
              onClick={showAllDates}
              className="ml-3 text-blue-600 hover:underline"
            >
              Show all dates
            </button>
          )}
        </div>
      </header>

      {/* Timeline */}
      <main className="relative flex-1">
        {isLoading && (
          <div className="absolute inset-0 flex items-center justify-center z-10 pointer-events-none">
            <Loader2 className="animate-spin text-blue-500 w-8 h-8" />
          </div>
        )}
        {isError && (
          <div className="absolute top-4 left-1/2 -translate-x-1/2 z-10 px-3 py-2 rounded-lg bg-red-50 border border-red-200 text-sm text-red-700">
            Could not load the timeline.
          </div>
        )}

        <TimelineCanvas engine={engine} onInteraction={handleInteraction} onViewChange={notifyChange} />

        <div className="absolute right-4 top-1/2 -translate-y-1/2 z-10">
          <TimelineZoomControls engine={engine} onChange={notifyChange} />
        </div>

        {/* Detail card */}
        {selected && (
          <div className="absolute bottom-4 left-4 z-10 w-80 p-4 rounded-xl bg-white/95 border border-slate-200 shadow-xl">
            <div className="flex items-start justify-between gap-2">
              <h2 className="font-semibold text-slate-900">{selected.name}</h2>
              <button onClick={clearSelection} className="p-1 -m-1 rounded hover:bg-slate-100 text-slate-400" title="Close">
                <X size={14} />
              </button>
            </div>
            <p className="text-xs text-slate-500 mt-1">{formatDateRange(selected.start, selected.end)}</p>
            {selected.tags && selected.tags.length > 0 && (
              <div className="flex gap-1 flex-wrap mt-2">
                {selected.tags.map((tag) => (
                  <span key={tag} className="px-1.5 py-0.5 rounded bg-slate-100 text-[10px] text-slate-600">
                    {tag}
                  </span>
                ))}
              </div>
            )}
            <p className="text-[10px] text-slate-400 mt-3">Double-click to focus its dates, triple-click to show all.</p>
          </div>
        )}
      </main>
    </div>
  );
}

export default function Home() {
  return (
    <Suspense fallback={
      <div className="flex h-screen w-full items-center justify-center bg-slate-50">
        <Loader2 className="animate-spin text-blue-500 w-8 h-8" />
      </div>
    }>
      <TimelineContent />
    </Suspense>
  );
}
