import React from "react";
import { render, screen } from "@testing-library/react";
import { App } from "./app";
import { MemorySnapshotStore } from "../persistence/snapshot-store";

// Mock the SimulationCanvas since PixiJS requires a real canvas context
jest.mock("./simulation-canvas", () => ({
  SimulationCanvas: () => <div data-testid="simulation-canvas" />,
}));

describe("App component", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("renders the status bar and canvas", () => {
    render(<App search="?cols=20&rows=10" store={new MemorySnapshotStore()} />);
    expect(screen.getByText("20x10 grid")).toBeDefined();
    expect(screen.getByTestId("simulation-canvas")).toBeDefined();
  });

  it("renders when browser storage is blocked", () => {
    jest.spyOn(window, "localStorage", "get").mockImplementation(() => {
      throw new Error("blocked");
    });
    render(<App search="?cols=20&rows=10" />);
    expect(screen.getByText("20x10 grid")).toBeDefined();
    expect(screen.getByTestId("simulation-canvas")).toBeDefined();
  });

  it("shows the configuration error instead of the simulation", () => {
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    render(<App search="?p=2" store={new MemorySnapshotStore()} />);
    expect(screen.getByRole("alert").textContent)
      .toBe("Invalid configuration: liveProbability must be within [0, 1], got 2");
    expect(screen.queryByTestId("simulation-canvas")).toBeNull();
  });
});
