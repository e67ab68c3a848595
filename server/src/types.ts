import type { InvestmentRequest } from './validators.js';

export type { InvestmentRequest } from './validators.js';

/** Everything the estimation API receives; `api_base_url` only picks the endpoint. */
export type InvestmentParameters = Omit<InvestmentRequest, 'api_base_url'>;

// ── Auth ─────────────────────────────────────────────────────────────
export interface AuthCredentials {
  username?: string;
  password?: string;
}

// ── Estimation outcome ───────────────────────────────────────────────
export type EstimationOutcome =
  | { kind: 'success'; data: unknown }
  | { kind: 'transport_error'; message: string; statusCode: number | null }
  | { kind: 'other_error'; message: string };

// What the tool-calling runtime receives
export interface TransportErrorResult {
  error: string;
  status_code: number | null;
}

export interface OtherErrorResult {
  error: string;
}
