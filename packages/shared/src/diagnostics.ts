import type { AlertSource } from './alerts.js';

// Low-severity pipeline notes. Never fingerprinted, never deduplicated.
export type DiagnosticKind =
  | 'OUT_OF_ORDER_SAMPLE'
  | 'INVALID_RECORD'
  | 'STALE_EVENT'
  | 'SOURCE_FALLBACK';

export interface Diagnostic {
  kind: DiagnosticKind;
  source: AlertSource;
  timestamp: number;
  message: string;
  data: Record<string, unknown>;
}
