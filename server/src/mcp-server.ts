/**
 * MCP Server — Real-estate estimator
 *
 * Tools:
 * 1. `greet` — trivial greeting, useful as a connectivity check
 * 2. `estimate_real_estate_investment` — proxies one request to the remote
 *    estimation API and hands its JSON back verbatim (or a normalized error)
 *
 * Every estimator parameter has a default, so clients only send what the user specified.
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { GetPromptResult, ReadResourceResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ServerConfig } from './config.js';
import { readCredentials } from './config.js';
import { EstimatorClient, toToolResult } from './integrations/estimator/client.js';
import { GreetShape, InvestmentRequestShape } from './validators.js';

// ── Helpers ──────────────────────────────────────────────────────────

export function greet(name: string): string {
  return `Hello, ${name}!`;
}

const INSTRUCTIONS_URI = 'estimator://instructions';

// ── MCP Server ───────────────────────────────────────────────────────

export function createMcpServer(config: ServerConfig): McpServer {
  const server = new McpServer({
    name: 'real-estate-estimator',
    version: '1.0.0',
  });

  server.tool(
    'greet',
    'Greet someone by name.',
    GreetShape,
    async ({ name }) => ({
      content: [{ type: 'text' as const, text: greet(name) }],
    })
  );

  // ════════════════════════════════════════════════════════════════════
  // ESTIMATOR — single outbound POST per call
  // ════════════════════════════════════════════════════════════════════
  server.tool(
    'estimate_real_estate_investment',
    'Estimate real estate investment profitability using the estimation API. If no data is specified for some fields, use the default value. Returns acquisition costs, financing details, exploitation metrics (NOI), tax calculations, cash flow, yields, DSCR, the price for the target cash flow and the IRR (tri).',
    InvestmentRequestShape,
    async (args) => {
      const { api_base_url, ...params } = args;
      const outcome = await EstimatorClient.estimate(params, {
        baseUrl: api_base_url ?? config.estimatorBaseUrl,
        credentials: readCredentials(),
        timeoutMs: config.estimatorTimeoutMs,
      });
      const result = toToolResult(outcome);

      return {
        // Error dictionaries are the tool's return value, not a failed call
        content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
      };
    }
  );

  // ════════════════════════════════════════════════════════════════════
  // PROMPTS
  // ════════════════════════════════════════════════════════════════════

  server.prompt(
    'analyze_investment',
    'Run a rental investment analysis for a property and summarize the results.',
    {
      purchase_price: z.string().optional().describe('Purchase price in euros'),
      rent: z.string().optional().describe('Monthly rent in euros'),
    },
    async ({ purchase_price, rent }): Promise<GetPromptResult> => {
      const known = [
        purchase_price ? `purchase_price=${purchase_price}` : null,
        rent ? `rent=${rent}` : null,
      ].filter(Boolean);

      return {
        messages: [
          {
            role: 'user',
            content: {
              type: 'text',
              text: [
                'Analyze this rental property investment.',
                '',
                `1. Call \`estimate_real_estate_investment\`${known.length ? ` with ${known.join(', ')}` : ''}. Leave every other parameter at its default unless I gave a value for it.`,
                '2. If the result has an `error` key, report it and stop.',
                '3. Otherwise present:',
                '   - Total acquisition cost and loan amount',
                '   - Monthly cash flow and yields',
                '   - DSCR and IRR (tri)',
                '   - The purchase price that would reach the target monthly cash flow',
              ].join('\n'),
            },
          },
        ],
      };
    }
  );

  // ════════════════════════════════════════════════════════════════════
  // RESOURCES
  // ════════════════════════════════════════════════════════════════════

  server.resource(
    'system-instructions',
    INSTRUCTIONS_URI,
    { mimeType: 'text/markdown' },
    async (): Promise<ReadResourceResult> => ({
      contents: [
        {
          uri: INSTRUCTIONS_URI,
          text: [
            '# Real-estate estimator — instructions',
            '',
            '## Tools',
            '- `greet` — returns "Hello, {name}!"',
            '- `estimate_real_estate_investment` — sends the parameters to the estimation API and returns its JSON unchanged',
            '',
            '## Defaults',
            '- Acquisition: purchase_price 50000, notary_rate 0.08, renovation 10000, furniture 0, agency_fees 0',
            '- Exploitation: rent 500/month, vacancy_months 0.5, management_pct 0, copro_charges 10, ll_insurance 10, property_tax 500/year, other_annual 0',
            '- Depreciation: building_years 30, furniture_years 7, land_share 0.15',
            '- Financing: loan_years 20, loan_rate 0.035, loan_insurance_rate 0.002, down_payment 5000',
            '- Objective: target_monthly_cf 0',
            '- Resale: resale_years and resale_price are left to the API (loan_years, purchase_price + renovation)',
            '',
            '## Errors',
            '- `{ "error": "HTTP error occurred: …", "status_code": … }` — the API was unreachable, timed out or answered non-2xx',
            '- `{ "error": "An error occurred: …" }` — anything else, e.g. an unreadable response',
          ].join('\n'),
        },
      ],
    })
  );

  return server;
}
