import React, { useRef, useEffect } from "react";
import { createLifeRenderer } from "../rendering/life-renderer";
import type { Renderer, RendererMetrics } from "../rendering/renderer-interface";
import type { FrameState, SimulationController } from "../simulation/simulation-controller";

interface Props {
  controller: SimulationController;
  onFrame?: (state: FrameState, metrics: RendererMetrics) => void;
}

export const SimulationCanvas: React.FC<Props> = ({ controller, onFrame }) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const onFrameRef = useRef(onFrame);
  onFrameRef.current = onFrame;

  useEffect(() => {
    const container = containerRef.current;
    if (!container) return;

    let destroyed = false;
    let rafId = 0;
    let renderer: Renderer | null = null;
    const { layout, config } = controller;

    function onKeyDown(e: KeyboardEvent): void {
      if (e.repeat) return;
      controller.enqueue({ type: "key-down", key: e.key });
      if (e.key === " ") e.preventDefault();
    }

    function onPointerDown(e: PointerEvent): void {
      if (!renderer) return;
      // Map client coordinates into canvas pixels in case the canvas is scaled by CSS
      const rect = renderer.canvas.getBoundingClientRect();
      const scaleX = rect.width > 0 ? layout.width / rect.width : 1;
      const scaleY = rect.height > 0 ? layout.height / rect.height : 1;
      controller.enqueue({
        type: "pointer-down",
        x: (e.clientX - rect.left) * scaleX,
        y: (e.clientY - rect.top) * scaleY,
      });
    }

    function stopLoop(): void {
      cancelAnimationFrame(rafId);
      window.removeEventListener("keydown", onKeyDown);
      renderer?.canvas.removeEventListener("pointerdown", onPointerDown);
    }

    function startRafLoop(r: Renderer): void {
      // Subtract 1ms tolerance so rAF timestamp jitter doesn't cause
      // occasional double-interval frames when elapsed ≈ 1000/fps.
      const minFrameInterval = 1000 / config.framesPerSecond - 1;
      let lastFrameTime = -1;

      function tick(timestamp: number): void {
        if (destroyed) return;

        if (lastFrameTime < 0) {
          lastFrameTime = timestamp;
        }

        // Frame rate capping: input keeps queueing while we wait
        const elapsed = timestamp - lastFrameTime;
        if (elapsed > 0 && elapsed < minFrameInterval) {
          rafId = requestAnimationFrame(tick);
          return;
        }
        lastFrameTime = timestamp;
        const fps = elapsed > 0 ? 1000 / elapsed : 0;

        const state = controller.frame(timestamp);
        const metrics = r.update(state.grid, {
          layout,
          showingInstructions: state.showingInstructions,
          paused: state.paused,
          generation: state.generation,
          status: state.status,
        });
        metrics.fps = fps;
        onFrameRef.current?.(state, metrics);

        if (state.quit) {
          stopLoop();
          return;
        }
        rafId = requestAnimationFrame(tick);
      }

      rafId = requestAnimationFrame(tick);
    }

    window.addEventListener("keydown", onKeyDown);

    (async () => {
      const canvas = document.createElement("canvas");
      container.appendChild(canvas);
      const r = await createLifeRenderer(canvas, layout.width, layout.height);

      if (destroyed) {
        r.destroy();
        return;
      }

      renderer = r;
      r.canvas.addEventListener("pointerdown", onPointerDown);
      startRafLoop(r);
    })().catch((err) => {
      console.error("Failed to initialize renderer:", err);
    });

    return () => {
      destroyed = true;
      stopLoop();
      renderer?.destroy();
      renderer = null;

      while (container.firstChild) {
        container.removeChild(container.firstChild);
      }
    };
  }, [controller]);

  return <div ref={containerRef} />;
};
