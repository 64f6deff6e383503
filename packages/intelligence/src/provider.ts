/**
 * What a provider is told about the incident under analysis
 */
export interface AnalysisSubject {
  id: number;
  title: string;
  description: string;
  metadata: Record<string, unknown>;
  alerts?: ReadonlyArray<{ name: string; description: string }>;
}

/**
 * Analysis backend contract.
 *
 * `run` may resolve to any list; the pipeline normalizes each entry with
 * `toRecommendationRecord`. Without a subject the provider reports on the
 * current system state.
 */
export interface IntelligenceProvider {
  readonly name: string;
  readonly description: string;
  run(subject?: AnalysisSubject): Promise<unknown[]>;
}
