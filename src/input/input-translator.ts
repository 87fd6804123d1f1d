import type { BoardLayout } from "../rendering/layout";
import { cellAtPixel, isInsideButton } from "../rendering/layout";

/** Input as reported by the rendering shell. Pointer positions are canvas pixels. */
export type RawInputEvent =
  | { type: "pointer-down"; x: number; y: number }
  | { type: "key-down"; key: string }
  | { type: "close" };

export type Command =
  | { type: "advance-generation" }
  | { type: "toggle-cell"; x: number; y: number }
  | { type: "toggle-pause" }
  | { type: "save-state" }
  | { type: "load-state" }
  | { type: "proceed" }
  | { type: "quit" };

export type KeyCommandType = Exclude<Command["type"], "toggle-cell" | "advance-generation">;

/** KeyboardEvent.key values mapped to commands. Single letters match either case. */
export type KeyBindings = Readonly<Record<string, KeyCommandType>>;

export const DEFAULT_KEY_BINDINGS: KeyBindings = {
  " ": "toggle-pause",
  "s": "save-state",
  "l": "load-state",
  "Enter": "proceed",
  "Escape": "quit",
  "q": "quit",
};

function lookupKey(bindings: KeyBindings, key: string): KeyCommandType | undefined {
  if (Object.prototype.hasOwnProperty.call(bindings, key)) return bindings[key];
  if (key.length === 1) {
    const lower = key.toLowerCase();
    if (Object.prototype.hasOwnProperty.call(bindings, lower)) return bindings[lower];
  }
  return undefined;
}

/**
 * Maps one raw event to a command, or null when the event means nothing
 * (an unbound key, a click outside the grid).
 *
 * The button is checked before the grid, since it is drawn on top of it.
 */
export function translateEvent(
  event: RawInputEvent,
  layout: BoardLayout,
  bindings: KeyBindings = DEFAULT_KEY_BINDINGS,
): Command | null {
  switch (event.type) {
    case "close":
      return { type: "quit" };
    case "key-down": {
      const type = lookupKey(bindings, event.key);
      return type ? { type } : null;
    }
    case "pointer-down": {
      if (isInsideButton(layout, event.x, event.y)) {
        return { type: "advance-generation" };
      }
      const cell = cellAtPixel(layout, event.x, event.y);
      return cell ? { type: "toggle-cell", x: cell.x, y: cell.y } : null;
    }
  }
}
