/**
 * Stage Prompts
 * System and task prompts for the four pipeline stages and the assistant
 */

import type { Evidence } from "../schemas/evidence.js";
import type { AnalystPayload, ReaderPayload, StrategistPayload } from "../schemas/artifacts.js";
import type { ConversationTurn, ContextFragment } from "../schemas/session.js";

const JSON_ONLY = "Respond with a single JSON object and nothing else.";

export const READER_SYSTEM_PROMPT = `You are a market research reader. You condense raw web, news and search results into the themes and signals that matter. ${JSON_ONLY}`;

export const ANALYST_SYSTEM_PROMPT = `You are a senior market analyst. You identify trends, opportunities and competitive dynamics from pre-digested research. ${JSON_ONLY}`;

export const STRATEGIST_SYSTEM_PROMPT = `You are a business strategist. You turn market analysis into prioritized, actionable recommendations. ${JSON_ONLY}`;

export const FORMATTER_SYSTEM_PROMPT = `You are a report editor. You write clear executive market-intelligence reports in Markdown. ${JSON_ONLY}`;

export const ASSISTANT_SYSTEM_PROMPT =
  "You are a market intelligence assistant. Answer follow-up questions concisely, grounded in the analysis context you are given. When the context does not cover a question, say so and answer from general knowledge.";

const MAX_EVIDENCE_CHARS = 12_000;
const MAX_SNIPPET_CHARS = 600;

/**
 * Evidence rendered per provider, truncated to a prompt-sized budget
 */
export function renderEvidence(evidence: readonly Evidence[]): string {
  const blocks: string[] = [];
  let used = 0;

  for (const entry of evidence) {
    for (const doc of entry.documents) {
      const block = `[${entry.providerId}/${entry.kind}] ${doc.title}${doc.publishedAt ? ` (${doc.publishedAt})` : ""}\n${doc.url}\n${doc.snippet.slice(0, MAX_SNIPPET_CHARS)}`;
      if (used + block.length > MAX_EVIDENCE_CHARS) {
        return blocks.join("\n\n");
      }
      blocks.push(block);
      used += block.length;
    }
  }

  return blocks.join("\n\n");
}

// ============================================================
// READER
// ============================================================

export function getReaderPrompt(options: {
  query: string;
  domain: string;
  question?: string;
  evidence: readonly Evidence[];
}): string {
  return `Analyze the following collected data about "${options.query}" in the ${options.domain} market.
${options.question ? `\nThe user is specifically interested in: ${options.question}\n` : ""}
## Collected Data
${renderEvidence(options.evidence)}

## Output Format
\`\`\`json
{
  "keyThemes": ["Main theme found in the data"],
  "marketSignals": ["Important market signal or indicator"],
  "dataQualityScore": 7,
  "contentSummary": "Brief summary of the collected content",
  "focusAreas": ["Area recommended for deeper analysis"]
}
\`\`\`

## Rules
- keyThemes must contain at least one theme
- dataQualityScore is a number from 1 to 10
- Only use information present in the collected data`;
}

// ============================================================
// ANALYST
// ============================================================

export function getAnalystPrompt(options: {
  query: string;
  domain: string;
  reader: ReaderPayload;
}): string {
  return `Based on the research digest below, analyze "${options.query}" in the ${options.domain} market.

## Research Digest
Summary: ${options.reader.contentSummary}
Key themes: ${options.reader.keyThemes.join("; ")}
Market signals: ${options.reader.marketSignals.join("; ") || "none reported"}
Focus areas: ${options.reader.focusAreas.join("; ") || "none reported"}
Data quality: ${options.reader.dataQualityScore}/10

## Output Format
\`\`\`json
{
  "trends": [
    {
      "name": "Trend name",
      "description": "What is happening and why it matters",
      "impact": "high | medium | low",
      "timeframe": "short-term | medium-term | long-term",
      "confidence": 0.8,
      "evidence": ["Supporting evidence"],
      "drivers": ["Key driver"]
    }
  ],
  "opportunities": [
    {
      "name": "Opportunity name",
      "description": "Description of the opportunity",
      "targetSegment": "Who it serves",
      "revenuePotential": "high | medium | low",
      "difficulty": "easy | medium | hard",
      "riskLevel": "high | medium | low",
      "timeToMarket": "e.g. 6-12 months",
      "requirements": ["Key requirement"]
    }
  ],
  "competitors": [
    {
      "name": "Company",
      "marketShare": "Estimated share",
      "strengths": ["Strength"],
      "recentDevelopments": "Recent move"
    }
  ],
  "synthesis": "Two or three sentences tying the analysis together"
}
\`\`\`

## Rules
- Identify 3-5 trends and 3-5 opportunities; both lists are mandatory
- confidence is a number between 0 and 1`;
}

// ============================================================
// STRATEGIST
// ============================================================

export function getStrategistPrompt(options: {
  query: string;
  domain: string;
  analyst: AnalystPayload;
}): string {
  const trends = options.analyst.trends
    .map((t) => `- ${t.name} (${t.impact} impact, ${t.timeframe}): ${t.description}`)
    .join("\n");
  const opportunities = options.analyst.opportunities
    .map((o) => `- ${o.name} (${o.revenuePotential} revenue, ${o.difficulty}): ${o.description}`)
    .join("\n");

  return `Develop strategic recommendations for "${options.query}" in the ${options.domain} market.

## Market Trends
${trends || "- none identified"}

## Opportunities
${opportunities || "- none identified"}

## Competitive Synthesis
${options.analyst.synthesis || "Not available"}

## Output Format
\`\`\`json
{
  "recommendations": [
    {
      "title": "Recommendation title",
      "description": "What to do",
      "objective": "What it achieves",
      "priority": "high | medium | low",
      "timeline": "short-term | medium-term | long-term",
      "successIndicators": ["Measurable indicator"],
      "steps": ["Concrete step"]
    }
  ],
  "risks": [
    { "risk": "Risk description", "likelihood": "high | medium | low", "mitigation": "How to mitigate" }
  ],
  "successMetrics": ["KPI to track"],
  "roadmap": {
    "shortTerm": ["0-6 month initiative"],
    "mediumTerm": ["6-18 month initiative"],
    "longTerm": ["18+ month initiative"]
  }
}
\`\`\`

## Rules
- Provide 3-5 recommendations; the list is mandatory
- Recommendations must follow from the trends and opportunities above`;
}

// ============================================================
// FORMATTER
// ============================================================

export function getFormatterPrompt(options: {
  query: string;
  domain: string;
  analyst?: AnalystPayload;
  strategist: StrategistPayload;
}): string {
  const analysis = options.analyst ? JSON.stringify(options.analyst, null, 2) : "Not available";

  return `Write an executive market intelligence report for "${options.query}" in the ${options.domain} market.

## Analysis
${analysis}

## Strategy
${JSON.stringify(options.strategist, null, 2)}

## Output Format
\`\`\`json
{
  "title": "Market Intelligence Report: ${options.domain}",
  "executiveSummary": "One paragraph summary for executives",
  "sections": [
    { "heading": "Market Trends Analysis", "body": "Markdown body" },
    { "heading": "Strategic Opportunities", "body": "Markdown body" },
    { "heading": "Strategic Recommendations", "body": "Markdown body" }
  ]
}
\`\`\`

## Rules
- At least one section is required
- Section bodies are Markdown; do not repeat the heading inside the body`;
}

// ============================================================
// CORRECTIONS
// ============================================================

/**
 * Stage prompt plus the defects of the previous attempt
 */
export function getCorrectivePrompt(prompt: string, defects: readonly string[]): string {
  return `${prompt}

## Correction Required
Your previous response did not match the required format:
${defects.map((d) => `- ${d}`).join("\n")}

Return the complete JSON object again with every problem fixed.`;
}

// ============================================================
// ASSISTANT
// ============================================================

export function getAssistantPrompt(options: {
  question: string;
  history: readonly ConversationTurn[];
  context: readonly ContextFragment[];
}): string {
  const history =
    options.history.length > 0
      ? options.history.map((t) => `${t.role === "user" ? "User" : "Assistant"}: ${t.text}`).join("\n")
      : "No previous conversation.";

  const context =
    options.context.length > 0
      ? options.context.map((f, i) => `[${i + 1}] ${f.text}`).join("\n\n")
      : "No prior analysis context is available; answer from general knowledge.";

  return `## Conversation So Far
${history}

## Analysis Context
${context}

## Question
${options.question}`;
}
