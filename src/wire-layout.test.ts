import { describe, expect, it } from "vitest";

import { parseLogLevel } from "./logger.js";
import { isFilled, pick, pickArray, pickString, safeJsonParse } from "./wire-layout.js";

describe("pick", () => {
  const payload = [null, ["a", ["b", "c"]], 3];

  it("walks nested arrays", () => {
    expect(pick(payload, [1, 1, 0])).toBe("b");
    expect(pickString(payload, [1, 0])).toBe("a");
    expect(pickArray(payload, [1, 1])).toEqual(["b", "c"]);
  });

  it("yields nothing for paths that leave the payload", () => {
    expect(pick(payload, [5])).toBeUndefined();
    expect(pick(payload, [0, 0])).toBeUndefined();
    expect(pick(payload, [2, 0])).toBeUndefined();
    expect(pickString(payload, [2])).toBeNull();
    expect(pickArray(payload, [1, 0])).toBeNull();
  });
});

describe("isFilled", () => {
  it("treats empty slots as absent", () => {
    expect([null, undefined, 0, "", []].map(isFilled)).toEqual([false, false, false, false, false]);
    expect([1, "x", [null], true].map(isFilled)).toEqual([true, true, true, true]);
  });
});

describe("safeJsonParse", () => {
  it("parses strings and gives up quietly otherwise", () => {
    expect(safeJsonParse("[1]")).toEqual([1]);
    expect(safeJsonParse("[1")).toBeUndefined();
    expect(safeJsonParse(42)).toBeUndefined();
  });
});

describe("parseLogLevel", () => {
  it("maps names to tslog level ids", () => {
    expect(parseLogLevel("DEBUG")).toBe(2);
    expect(parseLogLevel(" warn ")).toBe(4);
    expect(parseLogLevel("verbose")).toBe(3);
    expect(parseLogLevel(undefined)).toBe(3);
  });
});
