import type { WindowSpec } from "../decisions/types.js";

export type OutcomeVocabularyConfig = {
  /** Labels read as the positive class, matched case-insensitively. */
  positive?: string[];
  /** Labels read as the negative class. */
  negative?: string[];
  /** `result`/`outcome` strings that mark a record as correct. */
  correctTokens?: string[];
};

export type MetricsConfig = {
  /** `core` (interaction KPIs, RT, latency) or `full` (adds the outcome catalogue). */
  profile?: string;
  /** SLA threshold in seconds used to normalize HCL. */
  rtMaxS?: number;
  /** Expected session duration in seconds for EL; unset disables EL. */
  baselineS?: number | null;
  /** Return validation warnings and window notes with the result. */
  includeWarnings?: boolean;
  /** Restrict decisions to a time window before computing metrics. */
  window?: WindowSpec | null;
  outcomeVocabulary?: OutcomeVocabularyConfig;
};
