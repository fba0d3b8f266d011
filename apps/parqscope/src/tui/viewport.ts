import { clampNumber } from "./utils.js";

export type ViewportInput = {
  selection: number;
  scroll: number;
  visible: number;
  total: number;
};

/**
 * Scroll offset that keeps `selection` inside `[scroll, scroll + visible)`,
 * clamped to `[0, max(0, total - visible)]`.
 */
export function syncScrollOffset({ selection, scroll, visible, total }: ViewportInput): number {
  const window = Math.max(1, visible);
  let next = scroll;

  if (selection < next) {
    next = selection;
  } else if (selection >= next + window) {
    next = selection - window + 1;
  }

  return clampNumber(next, 0, Math.max(0, total - window));
}
