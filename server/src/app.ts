import cors from "cors";
import express from "express";
import type { Express } from "express";
import type { ServerConfig } from "./config.js";
import { createMcpServer } from "./mcp-server.js";
import { mcp } from "./middleware.js";
import { createToolRouter } from "./tool-routes.js";

export function createApp(config: ServerConfig): Express {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // ── MCP endpoint ─────────────────────────────────────────────────────
  app.use(mcp(() => createMcpServer(config)));

  // ── REST tool routes ─────────────────────────────────────────────────
  app.use("/api/tools", createToolRouter(config));

  return app;
}
