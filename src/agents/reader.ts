/**
 * Reader Stage
 * Condenses collected evidence into themes, signals and a quality score.
 * Fatal on failure: nothing downstream has another input source.
 */

import { ValidationError } from "../core/errors.js";
import { ReaderPayloadSchema, type ReaderPayload } from "../schemas/artifacts.js";
import { usableEvidence } from "../schemas/evidence.js";
import { getReaderPrompt, READER_SYSTEM_PROMPT } from "./prompts.js";
import { asRecord, salvageNumber, salvageString, salvageStrings } from "./salvage.js";
import type { StageStrategy } from "./types.js";

export const readerStrategy: StageStrategy<"reader"> = {
  stage: "reader",
  profile: "reader",
  systemPrompt: READER_SYSTEM_PROMPT,
  schema: ReaderPayloadSchema,

  resolveInput(ctx) {
    const usable = usableEvidence(ctx.evidence);
    if (usable.length === 0) {
      throw new ValidationError("Reader requires at least one usable evidence entry", {
        field: "evidence",
        context: { sessionId: ctx.sessionId, entries: ctx.evidence.length },
      });
    }
    return { kind: "evidence", evidenceIds: usable.map((e) => e.id) };
  },

  buildPrompt(ctx) {
    return getReaderPrompt({
      query: ctx.query,
      domain: ctx.domain,
      question: ctx.question,
      evidence: usableEvidence(ctx.evidence),
    });
  },

  salvage(candidate): ReaderPayload | null {
    const obj = asRecord(candidate);
    if (!obj) return null;
    return {
      keyThemes: salvageStrings(obj.keyThemes),
      marketSignals: salvageStrings(obj.marketSignals),
      dataQualityScore: salvageNumber(obj.dataQualityScore, 1, 10, 1),
      contentSummary: salvageString(obj.contentSummary),
      focusAreas: salvageStrings(obj.focusAreas),
    };
  },

  toArtifact(envelope, payload) {
    return { ...envelope, stage: "reader", payload };
  },
};
