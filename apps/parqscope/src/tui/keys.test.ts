import { describe, expect, it } from "vitest";

import { isPrintable, toKeyEvents, type InkKeyLike } from "./keys.js";

function inkKey(overrides: Partial<InkKeyLike> = {}): InkKeyLike {
  return {
    upArrow: false,
    downArrow: false,
    leftArrow: false,
    rightArrow: false,
    pageUp: false,
    pageDown: false,
    return: false,
    escape: false,
    ctrl: false,
    shift: false,
    tab: false,
    backspace: false,
    delete: false,
    meta: false,
    ...overrides,
  };
}

describe("toKeyEvents", () => {
  it("names special keys", () => {
    expect(toKeyEvents("", inkKey({ pageDown: true }))).toEqual([
      { name: "pagedown", ctrl: false, shift: false },
    ]);
    expect(toKeyEvents("", inkKey({ tab: true, shift: true }))).toEqual([
      { name: "tab", ctrl: false, shift: true },
    ]);
  });

  it("treats delete as backspace", () => {
    expect(toKeyEvents("", inkKey({ delete: true }))).toEqual([
      { name: "backspace", ctrl: false, shift: false },
    ]);
  });

  it("lower-cases control chords", () => {
    expect(toKeyEvents("C", inkKey({ ctrl: true }))).toEqual([{ name: "c", ctrl: true, shift: false }]);
  });

  it("splits pasted text into characters", () => {
    expect(toKeyEvents("aB ", inkKey())).toEqual([
      { name: "a", ctrl: false, shift: false },
      { name: "B", ctrl: false, shift: true },
      { name: " ", ctrl: false, shift: false },
    ]);
  });

  it("drops meta chords and control characters", () => {
    expect(toKeyEvents("x", inkKey({ meta: true }))).toEqual([]);
    expect(toKeyEvents("\u0007", inkKey())).toEqual([]);
  });
});

describe("isPrintable", () => {
  it("accepts visible characters and space", () => {
    expect(isPrintable("a")).toBe(true);
    expect(isPrintable(" ")).toBe(true);
    expect(isPrintable("\u007f")).toBe(false);
    expect(isPrintable("")).toBe(false);
  });
});
