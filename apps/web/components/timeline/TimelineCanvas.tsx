'use client';

import React, { useEffect, useRef } from 'react';
import type { EntityId } from '@strata/shared';
import { colourToCss } from '../../lib/colours';
import { TIMELINE_FONT_FAMILY } from '../../lib/constants';
import { applyWheelAction, ClickCounter, isClickAfterDrag, translateWheel } from '../../lib/pointer-input';
import type { TimelineEngine } from '../../lib/timeline-engine';
import type { FilledBox, TextOut, TimelineInteractionEvent } from '../../types';

interface TimelineCanvasProps {
  engine: TimelineEngine;
  onInteraction: (event: TimelineInteractionEvent) => void;
  onViewChange?: () => void; // Zoom or pan changed from inside the canvas
}

// --- Drawing Helpers ---

const drawBox = (ctx: CanvasRenderingContext2D, box: FilledBox) => {
  const { position, width, height } = box.positionAndSize;
  ctx.fillStyle = colourToCss(box.fillColour);
  ctx.fillRect(position.x, position.y, width, height);

  if (box.borderStyle) {
    // Border is drawn inside the box so it never bleeds into the neighbour
    const inset = box.borderStyle.thickness / 2;
    ctx.strokeStyle = colourToCss(box.borderStyle.colour);
    ctx.lineWidth = box.borderStyle.thickness;
    ctx.strokeRect(position.x + inset, position.y + inset, width - 2 * inset, height - 2 * inset);
  }
};

const drawText = (ctx: CanvasRenderingContext2D, text: TextOut) => {
  ctx.fillStyle = colourToCss(text.colour);
  ctx.font = `${text.fontSize}px ${TIMELINE_FONT_FAMILY}`;
  ctx.fillText(text.text, text.topLeft.x, text.topLeft.y);
};

export const TimelineCanvas: React.FC<TimelineCanvasProps> = ({ engine, onInteraction, onViewChange }) => {
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const containerRef = useRef<HTMLDivElement>(null);

  // Callbacks are read from refs so the render loop never restarts on a re-render
  const callbacksRef = useRef({ onInteraction, onViewChange });
  useEffect(() => {
    callbacksRef.current = { onInteraction, onViewChange };
  }, [onInteraction, onViewChange]);

  const dragRef = useRef<{ active: boolean; moved: boolean; lastEndMs: number | null }>({
    active: false,
    moved: false,
    lastEndMs: null,
  });
  const hoveredIdRef = useRef<EntityId | null>(null);
  const clickCounterRef = useRef(new ClickCounter());

  // --- Render Loop ---
  useEffect(() => {
    const canvas = canvasRef.current;
    const container = containerRef.current;
    if (!canvas || !container) return;

    let animationFrameId: number;

    const render = () => {
      // 1. Resize Handling
      const dpr = window.devicePixelRatio || 1;
      const rect = container.getBoundingClientRect();

      if (canvas.width !== rect.width * dpr || canvas.height !== rect.height * dpr) {
        canvas.width = rect.width * dpr;
        canvas.height = rect.height * dpr;
        canvas.style.width = `${rect.width}px`;
        canvas.style.height = `${rect.height}px`;
      }
      engine.setCanvasMax(rect.width, rect.height);

      const ctx = canvas.getContext('2d');
      if (ctx) {
        ctx.setTransform(dpr, 0, 0, dpr, 0, 0);
        ctx.clearRect(0, 0, rect.width, rect.height);
        ctx.textBaseline = 'top';
        ctx.textAlign = 'left';

        // 2. Backgrounds and gridlines sit under everything
        for (const background of engine.backgroundsForDrawing()) {
          ctx.fillStyle = colourToCss(background.colour);
          ctx.fillRect(background.x, 0, background.width, rect.height);
        }
        for (const line of engine.linesForDrawing()) {
          ctx.beginPath();
          ctx.strokeStyle = colourToCss(line.style.colour);
          ctx.lineWidth = line.style.thickness;
          ctx.moveTo(line.x, 0);
          ctx.lineTo(line.x, rect.height);
          ctx.stroke();
        }

        // 3. Entities
        for (const entity of engine.entitiesForDrawing()) {
          drawBox(ctx, entity.textBox);
          drawBox(ctx, entity.dateBox);
          drawText(ctx, entity.text);
        }

        // 4. Headings stay pinned to the top edge
        for (const heading of engine.headingsForDrawing()) {
          drawBox(ctx, heading.textBox);
          drawText(ctx, heading.text);
        }
      }

      // 5. Hand queued interactions to the page
      for (const event of engine.drainInteractionEvents()) {
        callbacksRef.current.onInteraction(event);
      }

      animationFrameId = requestAnimationFrame(render);
    };

    render();

    return () => {
      cancelAnimationFrame(animationFrameId);
    };
  }, [engine]);

  // --- Wheel ---
  // React registers wheel listeners as passive, so preventDefault needs a native one
  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;

    const handleWheel = (e: WheelEvent) => {
      e.preventDefault();
      applyWheelAction(engine, translateWheel(e));
      callbacksRef.current.onViewChange?.();
    };

    canvas.addEventListener('wheel', handleWheel, { passive: false });
    return () => canvas.removeEventListener('wheel', handleWheel);
  }, [engine]);

  // --- Mouse ---
  const updateHover = (e: React.MouseEvent) => {
    const hit = engine.entityAt(e.nativeEvent.offsetX, e.nativeEvent.offsetY);
    const hitId = hit ? hit.entity.id : null;
    if (hitId !== hoveredIdRef.current) {
      hoveredIdRef.current = hitId;
      engine.hoverOverEntity(hitId);
    }
  };

  const handleMouseDown = (e: React.MouseEvent) => {
    if (e.button !== 0) return;
    dragRef.current.active = true;
    dragRef.current.moved = false;
  };

  const handleMouseMove = (e: React.MouseEvent) => {
    const drag = dragRef.current;
    if (drag.active && (e.movementX !== 0 || e.movementY !== 0)) {
      drag.moved = true;
      engine.addToGlobalOffset(e.movementX, e.movementY);
      callbacksRef.current.onViewChange?.();
      return;
    }
    updateHover(e);
  };

  const endDrag = () => {
    const drag = dragRef.current;
    if (drag.active && drag.moved) {
      drag.lastEndMs = performance.now();
    }
    drag.active = false;
  };

  const handleMouseLeave = () => {
    endDrag();
    if (hoveredIdRef.current !== null) {
      hoveredIdRef.current = null;
      engine.hoverOverEntity(null);
    }
  };

  const handleClick = (e: React.MouseEvent) => {
    const now = performance.now();
    if (isClickAfterDrag(dragRef.current.lastEndMs, now)) return;

    const hit = engine.entityAt(e.nativeEvent.offsetX, e.nativeEvent.offsetY);
    if (!hit) {
      clickCounterRef.current.reset();
      return;
    }

    const id = hit.entity.id;
    switch (clickCounterRef.current.register(id, now)) {
      case 'single-click':
        engine.clickOnEntity(id);
        break;
      case 'double-click':
        engine.doubleClickOnEntity(id);
        break;
      case 'triple-click':
        engine.tripleClickOnEntity(id);
        break;
    }
  };

  return (
    <div ref={containerRef} className="absolute inset-0 overflow-hidden">
      <canvas
        ref={canvasRef}
        className="block w-full h-full cursor-grab active:cursor-grabbing"
        onMouseDown={handleMouseDown}
        onMouseMove={handleMouseMove}
        onMouseUp={endDrag}
        onMouseLeave={handleMouseLeave}
        onClick={handleClick}
      />
    </div>
  );
};
