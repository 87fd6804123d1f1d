import React, { useState, useCallback } from "react";
import { SimulationCanvas } from "./simulation-canvas";
import { parseConfig } from "../config";
import { ConfigError } from "../errors";
import { SimulationController, FrameState } from "../simulation/simulation-controller";
import { BrowserSnapshotStore, SnapshotStore } from "../persistence/snapshot-store";
import type { RendererMetrics } from "../rendering/renderer-interface";

interface Props {
  /** URL query string holding configuration overrides. */
  search?: string;
  store?: SnapshotStore;
}

type Setup =
  | { controller: SimulationController; error?: undefined }
  | { controller?: undefined; error: string };

function setUp(search: string, store: SnapshotStore | undefined): Setup {
  try {
    const config = parseConfig(search);
    const controller = new SimulationController(config, {
      store: store ?? new BrowserSnapshotStore(),
      now: performance.now(),
    });
    return { controller };
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error("Invalid configuration:", err.message);
    return { error: err.message };
  }
}

interface Summary {
  generation: number;
  population: number;
  paused: boolean;
  showingInstructions: boolean;
  status: string | null;
  quit: boolean;
  fps: number;
}

function sameSummary(a: Summary, b: Summary): boolean {
  return a.generation === b.generation && a.population === b.population && a.paused === b.paused &&
    a.showingInstructions === b.showingInstructions && a.status === b.status && a.quit === b.quit &&
    Math.round(a.fps) === Math.round(b.fps);
}

export const App = ({ search = window.location.search, store }: Props) => {
  const [setup] = useState(() => setUp(search, store));
  const [summary, setSummary] = useState<Summary | null>(null);

  const handleFrame = useCallback((state: FrameState, metrics: RendererMetrics) => {
    const next: Summary = {
      generation: state.generation,
      population: metrics.population,
      paused: state.paused,
      showingInstructions: state.showingInstructions,
      status: state.status,
      quit: state.quit,
      fps: metrics.fps,
    };
    setSummary(prev => (prev && sameSummary(prev, next) ? prev : next));
  }, []);

  if (!setup.controller) {
    return (
      <div className="app config-error" role="alert">
        Invalid configuration: {setup.error}
      </div>
    );
  }

  const { config } = setup.controller;

  // Build status line
  const parts: string[] = [`${config.cols}x${config.rows} grid`];
  if (summary) {
    if (summary.showingInstructions) {
      parts.push("Press Enter to start");
    } else {
      parts.push(`Generation ${summary.generation}`);
      parts.push(`Population ${summary.population}`);
      parts.push(summary.paused ? "Paused" : "Running");
    }
    parts.push(`${Math.round(summary.fps)} fps`);
  }

  return (
    <div className="app">
      <div className="status-bar">{parts.join(" | ")}</div>
      {summary?.status && <div className="status-message">{summary.status}</div>}
      {summary?.quit
        ? <div className="ended">Simulation ended</div>
        : <SimulationCanvas controller={setup.controller} onFrame={handleFrame} />}
    </div>
  );
};
