import { describe, it, expect } from "vitest";
import { extractJson } from "../src/agents/json.js";
import { z } from "zod";
import { formatIssues, salvageNumber, salvageStrings } from "../src/agents/salvage.js";

describe("extractJson", () => {
  it("parses a bare object", () => {
    expect(extractJson('{"a":1}')).toEqual({ ok: true, value: { a: 1 } });
  });

  it("prefers the fenced block", () => {
    expect(extractJson('Result:\n```json\n{"a":[1,2]}\n```\nDone {x}')).toEqual({ ok: true, value: { a: [1, 2] } });
  });

  it("finds an object surrounded by prose", () => {
    expect(extractJson('Here you go: {"title": "Outlook"} hope it helps')).toEqual({
      ok: true,
      value: { title: "Outlook" },
    });
  });

  it("reports text without JSON", () => {
    expect(extractJson("no structured output")).toEqual({
      ok: false,
      error: "Response did not contain a valid JSON object",
    });
  });
});

describe("salvage helpers", () => {
  it("keeps only the items that parse", () => {
    expect(salvageStrings(["grid", "", 4, " storage "])).toEqual(["grid", "storage"]);
    expect(salvageStrings("not a list")).toEqual([]);
  });

  it("clamps numbers to a fallback outside the range", () => {
    expect(salvageNumber("0.4", 0, 1, 0.5)).toBe(0.4);
    expect(salvageNumber(7, 0, 1, 0.5)).toBe(0.5);
  });

  it("formats issue paths", () => {
    const result = z.object({ trends: z.array(z.object({ name: z.string() })) }).safeParse({ trends: [{}] });
    expect(result.success ? [] : formatIssues(result.error.issues)).toEqual(["trends.0.name: Required"]);
  });
});
