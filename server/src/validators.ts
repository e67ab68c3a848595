import { z } from 'zod';

// ─── InvestmentRequest ──────────────────────────────────────────────────
// Field groups follow the estimation API: acquisition, exploitation,
// depreciation & tax, financing, objective, resale / IRR.

export const InvestmentRequestShape = {
  // Acquisition
  purchase_price: z.number().default(50000.0).describe('Property purchase price in euros'),
  notary_rate: z.number().default(0.08).describe('Notary fees rate (0.08 = 8%)'),
  renovation: z.number().default(10000.0).describe('Renovation costs in euros'),
  furniture: z.number().default(0.0).describe('Furniture costs in euros'),
  agency_fees: z.number().default(0.0).describe('Real estate agency fees in euros'),

  // Exploitation
  rent: z.number().default(500.0).describe('Monthly rent in euros'),
  vacancy_months: z.number().default(0.5).describe('Average vacancy months per year'),
  management_pct: z.number().default(0.0).describe('Property management fee percentage (0.0-1.0)'),
  copro_charges: z.number().default(10.0).describe('Monthly co-ownership charges in euros'),
  ll_insurance: z.number().default(10.0).describe('Monthly landlord insurance in euros'),
  property_tax: z.number().default(500.0).describe('Annual property tax in euros'),
  other_annual: z.number().default(0.0).describe('Other annual expenses in euros'),

  // Depreciation & tax
  building_years: z.number().int().default(30).describe('Building depreciation period in years'),
  furniture_years: z.number().int().default(7).describe('Furniture depreciation period in years'),
  land_share: z.number().default(0.15).describe('Land share of total price (non-depreciable)'),

  // Financing
  loan_years: z.number().int().default(20).describe('Loan duration in years'),
  loan_rate: z.number().default(0.035).describe('Annual loan interest rate (0.035 = 3.5%)'),
  loan_insurance_rate: z.number().default(0.002).describe('Annual loan insurance rate'),
  down_payment: z.number().default(5000.0).describe('Down payment amount in euros'),

  // Objective
  target_monthly_cf: z.number().default(0.0).describe('Target monthly cash flow in euros'),

  // Resale / IRR — no defaults, omitted from the payload when absent
  resale_years: z.number().int().nullish().describe('Years before resale (remote default: loan_years)'),
  resale_price: z.number().nullish().describe('Resale price (remote default: purchase_price + renovation)'),

  api_base_url: z.string().optional().describe('Base URL of the estimation API'),
};

export const InvestmentRequestSchema = z.object(InvestmentRequestShape);
export type InvestmentRequest = z.infer<typeof InvestmentRequestSchema>;

// ─── Greet ──────────────────────────────────────────────────────────────

export const GreetShape = {
  name: z.string().describe('Name of the person to greet'),
};

export const GreetSchema = z.object(GreetShape);

/**
 * Format zod validation errors into a human-readable string.
 */
export function formatValidationErrors(error: z.ZodError): string {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return `- ${path ? path + ': ' : ''}${issue.message}`;
  }).join('\n');
}
