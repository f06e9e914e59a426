import { describe, it, expect } from "vitest";
import { parsePriority, parseStatus, sortByPriority } from "../priority.js";
import type { Quest } from "../types.js";

const quest = (name: string, priority: Quest["priority"]): Quest => ({
  name,
  description: "",
  priority,
  done: false,
});

describe("parsePriority", () => {
  it("accepts canonical names", () => {
    expect(parsePriority("high")).toBe("high");
    expect(parsePriority("medium")).toBe("medium");
    expect(parsePriority("low")).toBe("low");
  });

  it("maps reference-locale names", () => {
    expect(parsePriority("alta")).toBe("high");
    expect(parsePriority("média")).toBe("medium");
    expect(parsePriority("media")).toBe("medium");
    expect(parsePriority("baixa")).toBe("low");
  });

  it("rejects anything else, including other casings", () => {
    expect(parsePriority("High")).toBeUndefined();
    expect(parsePriority("urgent")).toBeUndefined();
    expect(parsePriority("constructor")).toBeUndefined();
    expect(parsePriority("")).toBeUndefined();
  });
});

describe("parseStatus", () => {
  it("accepts pending and done only", () => {
    expect(parseStatus("pending")).toBe("pending");
    expect(parseStatus("done")).toBe("done");
    expect(parseStatus("todo")).toBeUndefined();
  });
});

describe("sortByPriority", () => {
  it("is stable and leaves the input untouched", () => {
    const input = [quest("a", "low"), quest("b", "high"), quest("c", "medium"), quest("d", "high")];
    const sorted = sortByPriority(input);
    expect(sorted.map((q) => q.name)).toEqual(["b", "d", "c", "a"]);
    expect(input.map((q) => q.name)).toEqual(["a", "b", "c", "d"]);
  });
});
