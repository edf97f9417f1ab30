import React, { useEffect, useState } from 'react';
import { Activity, ChevronDown, ChevronUp, Database, Maximize2, Rows3 } from 'lucide-react';
import { formatShortDate } from '@strata/shared';
import type { TimelineEngine } from '../../lib/timeline-engine';

interface DebugHUDProps {
  engine: TimelineEngine; // Read on every render; the parent re-renders on engine changes
}

const Row: React.FC<{ label: string; value: React.ReactNode }> = ({ label, value }) => (
  <div className="flex justify-between">
    <span>{label}:</span>
    <span className="font-bold text-slate-700">{value}</span>
  </div>
);

export const DebugHUD: React.FC<DebugHUDProps> = ({ engine }) => {
  const [isExpanded, setIsExpanded] = useState(true);

  // Drag State
  const [position, setPosition] = useState({ x: 24, y: 96 });
  const [isDragging, setIsDragging] = useState(false);
  const [dragOffset, setDragOffset] = useState({ x: 0, y: 0 });

  useEffect(() => {
    const handleMouseMove = (e: MouseEvent) => {
      if (!isDragging) return;
      setPosition({
        x: e.clientX - dragOffset.x,
        y: e.clientY - dragOffset.y,
      });
    };

    const handleMouseUp = () => {
      setIsDragging(false);
    };

    if (isDragging) {
      window.addEventListener('mousemove', handleMouseMove);
      window.addEventListener('mouseup', handleMouseUp);
    }
    return () => {
      window.removeEventListener('mousemove', handleMouseMove);
      window.removeEventListener('mouseup', handleMouseUp);
    };
  }, [isDragging, dragOffset]);

  const handleMouseDown = (e: React.MouseEvent) => {
    setIsDragging(true);
    setDragOffset({
      x: e.clientX - position.x,
      y: e.clientY - position.y,
    });
  };

  const offset = engine.offset();
  const canvas = engine.canvasMax();
  const [startDecade, endDecade] = engine.startAndEndDecades();
  const total = engine.entityCount();
  const visible = engine.visibleEntityCount();
  const limits = engine.dateLimits();

  return (
    <div
      className="fixed z-[9999] font-mono text-xs shadow-2xl border border-slate-200 bg-white/90 backdrop-blur-md rounded-lg overflow-hidden w-60"
      style={{ left: position.x, top: position.y }}
    >
      {/* Header / Toggle */}
      <div
        className="flex items-center justify-between px-3 py-2 bg-slate-100 cursor-move hover:bg-slate-200 transition-colors select-none"
        onMouseDown={handleMouseDown}
      >
        <div className="flex items-center gap-2 font-bold text-slate-700 pointer-events-none">
          <Activity size={14} className="text-blue-600" />
          <span>Dev Monitor</span>
        </div>
        <div
          className="p-1 -mr-1 hover:bg-slate-300 rounded cursor-pointer"
          onMouseDown={(e) => e.stopPropagation()}
          onClick={() => setIsExpanded(!isExpanded)}
        >
          {isExpanded ? <ChevronUp size={14} /> : <ChevronDown size={14} />}
        </div>
      </div>

      {isExpanded && (
        <div className="p-3 space-y-3">
          {/* Section 1: View */}
          <div className="space-y-1">
            <div className="flex items-center gap-2 text-slate-500 mb-1">
              <Maximize2 size={12} />
              <span className="font-semibold uppercase tracking-wider">View</span>
            </div>
            <Row label="Zoom" value={engine.zoom().toFixed(2)} />
            <Row label="Time scale" value={engine.datetimeScale().toFixed(1)} />
            <Row label="Font" value={`${engine.effectiveFontSizePx().toFixed(1)}px`} />
            <div className="text-[10px] text-slate-400 mt-1">
              Offset: {offset.x.toFixed(0)}, {offset.y.toFixed(0)} · Canvas: {canvas.x.toFixed(0)}×{canvas.y.toFixed(0)}
            </div>
          </div>

          {/* Section 2: Entities */}
          <div className="space-y-1 pt-2 border-t border-slate-200">
            <div className="flex items-center gap-2 text-slate-500 mb-1">
              <Database size={12} />
              <span className="font-semibold uppercase tracking-wider">Entities</span>
            </div>
            <Row label="Loaded" value={total} />
            <Row label="Passing filters" value={visible} />
            <div className="h-1.5 w-full bg-slate-200 rounded-full overflow-hidden flex">
              <div
                className="h-full bg-blue-500 transition-all duration-300"
                style={{ width: `${Math.min(100, (visible / (total || 1)) * 100)}%` }}
              />
            </div>
          </div>

          {/* Section 3: Layout */}
          <div className="space-y-1 pt-2 border-t border-slate-200">
            <div className="flex items-center gap-2 text-slate-500 mb-1">
              <Rows3 size={12} />
              <span className="font-semibold uppercase tracking-wider">Layout</span>
            </div>
            <Row label="Rows" value={engine.rowCount()} />
            <Row label="Decades" value={engine.dateRange().decadeCount} />
            <div className="text-[10px] text-slate-400 mt-1">
              Range: {startDecade}s → {endDecade}s
            </div>
            <div className="text-[10px] text-slate-400">
              Limits: {limits.start ? formatShortDate(limits.start) : '∞'} → {limits.end ? formatShortDate(limits.end) : '∞'}
            </div>
          </div>
        </div>
      )}
    </div>
  );
};
