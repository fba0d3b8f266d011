import type { KeyEvent } from "./types.js";

/** The subset of Ink's `Key` flags the explorer reads. */
export type InkKeyLike = {
  upArrow: boolean;
  downArrow: boolean;
  leftArrow: boolean;
  rightArrow: boolean;
  pageUp: boolean;
  pageDown: boolean;
  return: boolean;
  escape: boolean;
  ctrl: boolean;
  shift: boolean;
  tab: boolean;
  backspace: boolean;
  delete: boolean;
  meta: boolean;
};

const NAMED_KEYS: [keyof InkKeyLike, string][] = [
  ["upArrow", "up"],
  ["downArrow", "down"],
  ["leftArrow", "left"],
  ["rightArrow", "right"],
  ["pageUp", "pageup"],
  ["pageDown", "pagedown"],
  ["return", "return"],
  ["escape", "escape"],
  ["tab", "tab"],
  ["backspace", "backspace"],
  ["delete", "backspace"],
];

/**
 * Translate one Ink input callback into key events. Pasted text arrives as a
 * single callback and is split into one event per character.
 */
export function toKeyEvents(input: string, key: InkKeyLike): KeyEvent[] {
  for (const [flag, name] of NAMED_KEYS) {
    if (key[flag]) {
      return [{ name, ctrl: key.ctrl, shift: key.shift }];
    }
  }

  if (key.ctrl) {
    return input.length > 0 ? [{ name: input.toLowerCase(), ctrl: true, shift: key.shift }] : [];
  }

  if (key.meta) {
    return [];
  }

  return [...input]
    .filter(isPrintable)
    .map((character) => ({
      name: character,
      ctrl: false,
      shift: character !== character.toLowerCase(),
    }));
}

export function isPrintable(character: string): boolean {
  return character.length > 0 && character >= " " && character !== "\u007f";
}
