/**
 * Report rendering
 * Markdown sections and dashboard counts built straight from stage payloads.
 * Used for the templated Formatter fallback, for the dashboard numbers of
 * every report, and for indexing artifacts into the retriever.
 */

import type {
  AnalystPayload,
  DashboardSummary,
  FormatterPayload,
  ReaderPayload,
  ReportSection,
  StrategistPayload,
} from "../schemas/artifacts.js";

const percent = (value: number): string => `${Math.round(value * 100)}%`;
const bullets = (items: readonly string[]): string => items.map((item) => `- ${item}`).join("\n");

export function formatReaderSection(reader: ReaderPayload): string {
  const parts = [
    reader.contentSummary,
    `**Data Quality:** ${reader.dataQualityScore}/10`,
    `**Key Themes:**\n${bullets(reader.keyThemes)}`,
  ];
  if (reader.marketSignals.length > 0) {
    parts.push(`**Market Signals:**\n${bullets(reader.marketSignals)}`);
  }
  if (reader.focusAreas.length > 0) {
    parts.push(`**Focus Areas:**\n${bullets(reader.focusAreas)}`);
  }
  return parts.join("\n\n");
}

export function formatTrendsSection(analyst: AnalystPayload): string {
  if (analyst.trends.length === 0) {
    return "No significant trends identified in the current analysis.";
  }

  return analyst.trends
    .map((trend, i) => {
      const lines = [
        `### ${i + 1}. ${trend.name}`,
        `**Impact Level:** ${trend.impact} | **Timeframe:** ${trend.timeframe} | **Confidence:** ${percent(trend.confidence)}`,
        trend.description,
      ];
      if (trend.drivers.length > 0) lines.push(`**Key Drivers:**\n${bullets(trend.drivers)}`);
      if (trend.evidence.length > 0) lines.push(`**Supporting Evidence:**\n${bullets(trend.evidence)}`);
      return lines.join("\n\n");
    })
    .join("\n\n");
}

export function formatOpportunitiesSection(analyst: AnalystPayload): string {
  if (analyst.opportunities.length === 0) {
    return "No specific opportunities identified in the current analysis.";
  }

  return analyst.opportunities
    .map((opp, i) => {
      const lines = [
        `### ${i + 1}. ${opp.name}`,
        `**Revenue Potential:** ${opp.revenuePotential} | **Implementation:** ${opp.difficulty} | **Risk:** ${opp.riskLevel}`,
        opp.description,
      ];
      if (opp.targetSegment) lines.push(`**Target Segment:** ${opp.targetSegment}`);
      if (opp.timeToMarket) lines.push(`**Time to Market:** ${opp.timeToMarket}`);
      if (opp.requirements.length > 0) lines.push(`**Key Requirements:**\n${bullets(opp.requirements)}`);
      return lines.join("\n\n");
    })
    .join("\n\n");
}

export function formatCompetitiveSection(analyst: AnalystPayload): string {
  const parts: string[] = [];
  if (analyst.competitors.length > 0) {
    parts.push(
      analyst.competitors
        .map((c) => {
          const share = c.marketShare ? ` (${c.marketShare})` : "";
          const strengths = c.strengths.length > 0 ? `: ${c.strengths.join(", ")}` : "";
          return `- **${c.name}**${share}${strengths}`;
        })
        .join("\n")
    );
  }
  if (analyst.synthesis) {
    parts.push(analyst.synthesis);
  }
  return parts.length > 0 ? parts.join("\n\n") : "Competitive landscape analysis not available.";
}

export function formatRecommendationsSection(strategist: StrategistPayload): string {
  if (strategist.recommendations.length === 0) {
    return "No strategic recommendations were produced.";
  }

  return strategist.recommendations
    .map((rec, i) => {
      const lines = [
        `### ${i + 1}. ${rec.title}`,
        `**Priority:** ${rec.priority} | **Timeline:** ${rec.timeline}`,
        rec.description,
      ];
      if (rec.objective) lines.push(`**Objective:** ${rec.objective}`);
      if (rec.steps.length > 0) lines.push(`**Implementation Steps:**\n${bullets(rec.steps)}`);
      if (rec.successIndicators.length > 0) {
        lines.push(`**Success Indicators:**\n${bullets(rec.successIndicators)}`);
      }
      return lines.join("\n\n");
    })
    .join("\n\n");
}

export function formatRisksSection(strategist: StrategistPayload): string {
  if (strategist.risks.length === 0) {
    return "No material risks were identified.";
  }
  return strategist.risks
    .map((r) => `- **${r.risk}** (likelihood: ${r.likelihood})${r.mitigation ? ` - ${r.mitigation}` : ""}`)
    .join("\n");
}

export function formatRoadmapSection(strategist: StrategistPayload): string {
  const { shortTerm, mediumTerm, longTerm } = strategist.roadmap;
  const phases: Array<[string, string[]]> = [
    ["Short Term (0-6 months)", shortTerm],
    ["Medium Term (6-18 months)", mediumTerm],
    ["Long Term (18+ months)", longTerm],
  ];
  const rendered = phases
    .filter(([, items]) => items.length > 0)
    .map(([label, items]) => `**${label}:**\n${bullets(items)}`);
  return rendered.length > 0 ? rendered.join("\n\n") : "Roadmap not available.";
}

export function buildDashboard(
  analyst: AnalystPayload | undefined,
  strategist: StrategistPayload | undefined
): DashboardSummary {
  const recommendations = strategist?.recommendations ?? [];
  return {
    totalTrends: analyst?.trends.length ?? 0,
    totalOpportunities: analyst?.opportunities.length ?? 0,
    totalRecommendations: recommendations.length,
    highPriorityItems: recommendations.filter((r) => r.priority === "high").length,
  };
}

export interface TemplateInput {
  query: string;
  domain: string;
  analyst?: AnalystPayload;
  strategist?: StrategistPayload;
}

/**
 * Minimal report assembled without a reasoning call
 */
export function templatedReport(input: TemplateInput): FormatterPayload {
  const dashboard = buildDashboard(input.analyst, input.strategist);
  const sections: ReportSection[] = [];

  if (input.analyst) {
    sections.push(
      { heading: "Market Trends Analysis", body: formatTrendsSection(input.analyst) },
      { heading: "Strategic Opportunities", body: formatOpportunitiesSection(input.analyst) },
      { heading: "Competitive Landscape", body: formatCompetitiveSection(input.analyst) }
    );
  }
  if (input.strategist) {
    sections.push(
      { heading: "Strategic Recommendations", body: formatRecommendationsSection(input.strategist) },
      { heading: "Risk Assessment", body: formatRisksSection(input.strategist) },
      { heading: "Strategic Roadmap", body: formatRoadmapSection(input.strategist) }
    );
  }
  if (sections.length === 0) {
    sections.push({ heading: "Summary", body: "Upstream analysis was not available." });
  }

  return {
    title: `Market Intelligence Report: ${input.domain}`,
    executiveSummary:
      `This market intelligence report analyzes **${input.query}** in the ${input.domain} sector. ` +
      `The analysis identified ${dashboard.totalTrends} key market trends, ` +
      `${dashboard.totalOpportunities} strategic opportunities, and ` +
      `${dashboard.totalRecommendations} actionable recommendations.`,
    sections,
    dashboard,
    templated: true,
  };
}

export function renderReportMarkdown(report: FormatterPayload): string {
  return [
    `# ${report.title}`,
    `## Executive Summary\n\n${report.executiveSummary}`,
    ...report.sections.map((s) => `## ${s.heading}\n\n${s.body}`),
  ].join("\n\n");
}
