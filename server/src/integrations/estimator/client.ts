import type {
  AuthCredentials,
  EstimationOutcome,
  InvestmentParameters,
  OtherErrorResult,
  TransportErrorResult,
} from '../../types.js';

// ── Field mapping (local snake_case → wire camelCase) ─────────────────
// Order is the order keys appear in the JSON body.
export const FIELD_MAPPING = [
  ['purchase_price', 'purchasePrice'],
  ['notary_rate', 'notaryRate'],
  ['renovation', 'renovation'],
  ['furniture', 'furniture'],
  ['agency_fees', 'agencyFees'],
  ['rent', 'rent'],
  ['vacancy_months', 'vacancyMonths'],
  ['management_pct', 'managementPct'],
  ['copro_charges', 'coproCharges'],
  ['ll_insurance', 'llInsurance'],
  ['property_tax', 'propertyTax'],
  ['other_annual', 'otherAnnual'],
  ['building_years', 'buildingYears'],
  ['furniture_years', 'furnitureYears'],
  ['land_share', 'landShare'],
  ['loan_years', 'loanYears'],
  ['loan_rate', 'loanRate'],
  ['loan_insurance_rate', 'loanInsuranceRate'],
  ['down_payment', 'downPayment'],
  ['target_monthly_cf', 'targetMonthlyCf'],
  ['resale_years', 'resaleYears'],
  ['resale_price', 'resalePrice'],
] as const satisfies ReadonlyArray<readonly [keyof InvestmentParameters, string]>;

export type WireField = (typeof FIELD_MAPPING)[number][1];
export type OutboundPayload = Partial<Record<WireField, number>>;

/**
 * Error raised for a failed request/response cycle: non-2xx status,
 * connection failure or timeout. `statusCode` is null when no response arrived.
 */
export class EstimatorHttpError extends Error {
  constructor(message: string, readonly statusCode: number | null = null) {
    super(message);
    this.name = 'EstimatorHttpError';
  }

  static fromStatus(status: number, statusText: string, url: string): EstimatorHttpError {
    const kind =
      status >= 500 ? 'Server error'
      : status >= 400 ? 'Client error'
      : status >= 300 ? 'Redirect'
      : 'Unexpected status';
    const label = `${status} ${statusText}`.trim();
    return new EstimatorHttpError(`${kind} '${label}' for url '${url}'`, status);
  }
}

function isAbortError(err: unknown): boolean {
  // DOMException from AbortController
  return (
    typeof err === 'object' && err !== null && 'name' in err &&
    (err.name === 'AbortError' || err.name === 'TimeoutError')
  );
}

function errorMessage(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause instanceof Error ? err.cause.message : '';
  return cause ? `${err.message}: ${cause}` : err.message;
}

/**
 * EstimatorClient — single-shot proxy to the remote real-estate estimation API.
 * POST {baseUrl}/api/estimate with the mapped payload; never retries, never throws.
 */
export class EstimatorClient {
  static readonly ESTIMATE_PATH = '/api/estimate';
  static readonly TIMEOUT_MS = 30_000;

  /** Basic-Auth header, or nothing when either credential is missing or empty. */
  static buildAuthHeaders(credentials: AuthCredentials): Record<string, string> {
    const { username, password } = credentials;
    if (!username || !password) return {};
    const encoded = Buffer.from(`${username}:${password}`, 'utf8').toString('base64');
    return { Authorization: `Basic ${encoded}` };
  }

  static buildHeaders(credentials: AuthCredentials): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      ...this.buildAuthHeaders(credentials),
    };
  }

  /** Project parameters onto wire names, omitting absent values instead of sending null. */
  static buildPayload(params: InvestmentParameters): OutboundPayload {
    const payload: OutboundPayload = {};
    for (const [local, wire] of FIELD_MAPPING) {
      const value = params[local];
      if (value === undefined || value === null) continue;
      payload[wire] = value;
    }
    return payload;
  }

  /** Full estimate URL; throws EstimatorHttpError when it is not an absolute http(s) URL. */
  static endpoint(baseUrl: string): string {
    const url = `${baseUrl.replace(/\/+$/, '')}${this.ESTIMATE_PATH}`;
    let protocol: string;
    try {
      protocol = new URL(url).protocol;
    } catch {
      throw new EstimatorHttpError(`Request URL is missing an 'http://' or 'https://' protocol: '${url}'`);
    }
    if (protocol !== 'http:' && protocol !== 'https:') {
      throw new EstimatorHttpError(`Unsupported protocol '${protocol}' in url '${url}'`);
    }
    return url;
  }

  static async estimate(
    params: InvestmentParameters,
    opts: { baseUrl: string; credentials: AuthCredentials; timeoutMs?: number },
  ): Promise<EstimationOutcome> {
    const timeoutMs = opts.timeoutMs ?? this.TIMEOUT_MS;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const url = this.endpoint(opts.baseUrl);
      const payload = this.buildPayload(params);
      const headers = this.buildHeaders(opts.credentials);

      const { username, password } = opts.credentials;
      if (Boolean(username) !== Boolean(password)) {
        console.warn('[Estimator] Only one of API_USERNAME / API_PASSWORD is set, calling unauthenticated');
      }

      console.log(`[Estimator] POST ${url} (${Object.keys(payload).length} fields${headers.Authorization ? ', basic auth' : ''})`);

      const res = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(payload),
        // A 3xx is reported, never followed: one POST per call
        redirect: 'manual',
        signal: controller.signal,
      }).catch((err: unknown) => {
        throw isAbortError(err) ? err : new EstimatorHttpError(errorMessage(err));
      });

      if (!res.ok) {
        // Drain the body so the connection is released
        await res.text().catch(() => '');
        throw EstimatorHttpError.fromStatus(res.status, res.statusText, url);
      }

      const data: unknown = await res.json();
      return { kind: 'success', data };
    } catch (err) {
      if (err instanceof EstimatorHttpError) {
        console.warn(`[Estimator] HTTP error: ${err.message}`);
        return { kind: 'transport_error', message: err.message, statusCode: err.statusCode };
      }
      if (isAbortError(err)) {
        console.warn(`[Estimator] Timed out after ${timeoutMs}ms`);
        return { kind: 'transport_error', message: `Request timed out after ${timeoutMs}ms`, statusCode: null };
      }
      console.error(`[Estimator] Unexpected error: ${errorMessage(err)}`);
      return { kind: 'other_error', message: errorMessage(err) };
    } finally {
      clearTimeout(timer);
    }
  }
}

/** Flatten an outcome into the dictionary the tool runtime receives. */
export function toToolResult(outcome: EstimationOutcome): unknown {
  switch (outcome.kind) {
    case 'success':
      return outcome.data;
    case 'transport_error': {
      const result: TransportErrorResult = {
        error: `HTTP error occurred: ${outcome.message}`,
        status_code: outcome.statusCode,
      };
      return result;
    }
    case 'other_error': {
      const result: OtherErrorResult = { error: `An error occurred: ${outcome.message}` };
      return result;
    }
  }
}
