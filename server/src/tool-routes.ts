/**
 * REST mirror of the MCP tools, for runtimes that call plain HTTP tools
 * instead of speaking MCP.
 *
 * Estimator credentials stay server-side; callers never see them.
 */
import { Router } from 'express';
import type { ServerConfig } from './config.js';
import { readCredentials } from './config.js';
import { EstimatorClient, toToolResult } from './integrations/estimator/client.js';
import { greet } from './mcp-server.js';
import { formatValidationErrors, GreetSchema, InvestmentRequestSchema } from './validators.js';

export function createToolRouter(config: ServerConfig): Router {
  const toolRouter = Router();

  /**
   * POST /api/tools/greet
   * Body: { name: string }
   * Returns: { greeting: string }
   */
  toolRouter.post('/greet', (req, res) => {
    const parsed = GreetSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: 'Missing "name" string in request body.' });
    }

    res.json({ greeting: greet(parsed.data.name) });
  });

  /**
   * POST /api/tools/estimate
   * Body: investment parameters (snake_case, all optional)
   * Returns: the estimation API's JSON, or { error, status_code? } with 502
   */
  toolRouter.post('/estimate', async (req, res) => {
    const parsed = InvestmentRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: `Invalid parameters:\n${formatValidationErrors(parsed.error)}` });
    }

    const { api_base_url, ...params } = parsed.data;
    console.log(`[ToolAPI] Estimate: purchase_price=${params.purchase_price} rent=${params.rent}`);

    const outcome = await EstimatorClient.estimate(params, {
      baseUrl: api_base_url ?? config.estimatorBaseUrl,
      credentials: readCredentials(),
      timeoutMs: config.estimatorTimeoutMs,
    });

    res.status(outcome.kind === 'success' ? 200 : 502).json(toToolResult(outcome));
  });

  /**
   * GET /api/tools/health
   * Quick check of estimator configuration (never echoes credentials).
   */
  toolRouter.get('/health', (_req, res) => {
    const { username, password } = readCredentials();
    res.json({
      status: 'ok',
      estimator: config.estimatorBaseUrl,
      auth: Boolean(username && password),
    });
  });

  return toolRouter;
}
