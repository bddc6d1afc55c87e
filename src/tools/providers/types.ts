/**
 * Evidence Provider Types
 * Every data source implements this one capability; the aggregator never
 * needs to change when a provider is added.
 */

import type { EvidenceDocument, EvidenceKind } from "../../schemas/evidence.js";

export interface ProviderResult {
  documents: EvidenceDocument[];
  /** Provider-reported reliability/confidence, 0..1 */
  reliability: number;
}

export interface EvidenceProvider {
  readonly id: string;
  readonly kind: EvidenceKind;

  /**
   * Fetch evidence for a query within a market domain. Must honor `signal`.
   * Throws TransientProviderError or UnrecoverableProviderError.
   */
  fetch(query: string, domain: string, signal: AbortSignal): Promise<ProviderResult>;
}
