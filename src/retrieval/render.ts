/**
 * Plain-text rendering of stage artifacts for indexing
 */

import {
  formatCompetitiveSection,
  formatOpportunitiesSection,
  formatReaderSection,
  formatRecommendationsSection,
  formatRisksSection,
  formatRoadmapSection,
  formatTrendsSection,
  renderReportMarkdown,
} from "../agents/report.js";
import type { StageArtifact } from "../schemas/artifacts.js";

export interface SessionMeta {
  query: string;
  domain: string;
}

export function renderArtifact(artifact: StageArtifact, meta: SessionMeta): string {
  const header = `Analysis of "${meta.query}" in the ${meta.domain} market`;

  switch (artifact.stage) {
    case "reader":
      return artifact.payload
        ? `${header} - research digest\n\n${formatReaderSection(artifact.payload)}`
        : "";
    case "analyst":
      return artifact.payload
        ? [
            `${header} - market analysis`,
            `Trends\n\n${formatTrendsSection(artifact.payload)}`,
            `Opportunities\n\n${formatOpportunitiesSection(artifact.payload)}`,
            `Competitive landscape\n\n${formatCompetitiveSection(artifact.payload)}`,
          ].join("\n\n")
        : "";
    case "strategist":
      return artifact.payload
        ? [
            `${header} - strategy`,
            `Recommendations\n\n${formatRecommendationsSection(artifact.payload)}`,
            `Risks\n\n${formatRisksSection(artifact.payload)}`,
            `Roadmap\n\n${formatRoadmapSection(artifact.payload)}`,
          ].join("\n\n")
        : "";
    case "formatter":
      return artifact.payload ? `${header} - report\n\n${renderReportMarkdown(artifact.payload)}` : "";
  }
}
