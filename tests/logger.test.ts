import { afterEach, describe, it, expect } from "vitest";
import { logger, type LogEntry } from "../src/core/logger.js";
import { StageTransportError } from "../src/core/errors.js";

function capture(): LogEntry[] {
  const entries: LogEntry[] = [];
  logger.setHandlers([(entry) => entries.push(entry)]);
  return entries;
}

afterEach(() => {
  logger.setLevel("info");
  logger.setHandlers([]);
});

describe("logger", () => {
  it("merges child context into every entry", () => {
    const entries = capture();
    const log = logger.child({ component: "orchestrator", sessionId: "s1" }).child({ stage: "analyst" });

    log.info("Stage entered", { attempt: 1 });

    expect(entries[0]?.context).toEqual({ component: "orchestrator", sessionId: "s1", stage: "analyst", attempt: 1 });
  });

  it("drops entries below the current level", () => {
    const entries = capture();
    logger.setLevel("warn");

    logger.info("hidden");
    logger.warn("shown");

    expect(entries.map((e) => e.message)).toEqual(["shown"]);
  });

  it("records error code and message", () => {
    const entries = capture();

    logger.error("Stage failed", new StageTransportError("overloaded"));

    expect(entries[0]?.error?.code).toBe("STAGE_TRANSPORT");
    expect(entries[0]?.error?.message).toBe("overloaded");
  });

  it("formats metrics", () => {
    const entries = capture();

    logger.child({ component: "aggregator" }).metric("evidence_collection_ms", 42);

    expect(entries[0]?.message).toBe("METRIC: evidence_collection_ms=42");
    expect(entries[0]?.context).toEqual({ component: "aggregator", metric: "evidence_collection_ms", value: 42 });
  });
});
