import React from 'react';
import { Minus, Plus, RotateCcw, ZoomIn, ZoomOut } from 'lucide-react';
import { BUTTON_ZOOM_FACTOR, DATETIME_SCALE_STEP, MAX_DATETIME_SCALE, MAX_ZOOM, MIN_DATETIME_SCALE, MIN_ZOOM } from '../../../lib/constants';
import type { TimelineEngine } from '../../../lib/timeline-engine';

interface TimelineZoomControlsProps {
  engine: TimelineEngine;
  onChange: () => void;
}

const BUTTON_CLASS =
  'p-2 rounded-lg bg-white/40 border border-black/5 text-slate-500 hover:text-blue-600 hover:bg-white/60 hover:border-blue-200 transition-all shadow-sm disabled:opacity-40 disabled:pointer-events-none';

export const TimelineZoomControls: React.FC<TimelineZoomControlsProps> = ({ engine, onChange }) => {
  // Buttons zoom around the middle of the canvas
  const centre = () => {
    const size = engine.canvasMax();
    return { x: size.x / 2, y: size.y / 2 };
  };

  const handleZoom = (direction: 'in' | 'out') => {
    const { x, y } = centre();
    if (direction === 'in') engine.zoomIn(BUTTON_ZOOM_FACTOR, x, y);
    else engine.zoomOut(BUTTON_ZOOM_FACTOR, x, y);
    onChange();
  };

  const handleScale = (step: number) => {
    engine.setDatetimeScale(engine.datetimeScale() + step);
    onChange();
  };

  const resetView = () => {
    engine.setZoom(1);
    engine.setDatetimeScale(MIN_DATETIME_SCALE);
    const offset = engine.offset();
    engine.addToGlobalOffset(-offset.x, -offset.y);
    onChange();
  };

  const zoom = engine.zoom();
  const scale = engine.datetimeScale();

  return (
    <div className="flex flex-col gap-2" onMouseDown={(e) => e.stopPropagation()}>
      <button onClick={() => handleZoom('in')} disabled={zoom >= MAX_ZOOM} className={BUTTON_CLASS} title="Zoom In">
        <ZoomIn size={20} />
      </button>
      <button onClick={() => handleZoom('out')} disabled={zoom <= MIN_ZOOM} className={BUTTON_CLASS} title="Zoom Out">
        <ZoomOut size={20} />
      </button>

      <div className="h-px bg-slate-300/60 mx-1" />

      <button
        onClick={() => handleScale(DATETIME_SCALE_STEP)}
        disabled={scale >= MAX_DATETIME_SCALE}
        className={BUTTON_CLASS}
        title="Stretch Time Axis"
      >
        <Plus size={20} />
      </button>
      <div className="text-[10px] font-mono text-center text-slate-500">{scale.toFixed(1)}×</div>
      <button
        onClick={() => handleScale(-DATETIME_SCALE_STEP)}
        disabled={scale <= MIN_DATETIME_SCALE}
        className={BUTTON_CLASS}
        title="Compress Time Axis"
      >
        <Minus size={20} />
      </button>

      <div className="h-px bg-slate-300/60 mx-1" />

      <button onClick={resetView} className={BUTTON_CLASS} title="Reset View">
        <RotateCcw size={20} />
      </button>
    </div>
  );
};
