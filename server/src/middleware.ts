import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { NextFunction, Request, Response } from "express";

/**
 * Express middleware that handles the /mcp endpoint using StreamableHTTP.
 *
 * Stateless mode (sessionIdGenerator: undefined): every POST gets its own
 * server + transport, closed once the response is done, so concurrent
 * tool calls never share a transport.
 */
export const mcp =
  (createServer: () => McpServer) => {
    return async (req: Request, res: Response, next: NextFunction) => {
      if (req.path !== "/mcp") {
        return next();
      }

      if (req.method === "POST") {
        const server = createServer();
        const transport = new StreamableHTTPServerTransport({
          sessionIdGenerator: undefined,
        });

        res.on("close", () => {
          transport.close().catch((err: unknown) => {
            console.warn("[MCP] Transport close failed:", err);
          });
          server.close().catch((err: unknown) => {
            console.warn("[MCP] Server close failed:", err);
          });
        });

        try {
          await server.connect(transport);
          await transport.handleRequest(req, res, req.body);
        } catch (error) {
          console.error("[MCP] Error handling request:", error);
          if (!res.headersSent) {
            res.status(500).json({
              jsonrpc: "2.0",
              error: { code: -32603, message: "Internal server error" },
              id: null,
            });
          }
        }
      } else if (req.method === "GET" || req.method === "DELETE") {
        res.writeHead(405, { "Content-Type": "application/json" }).end(
          JSON.stringify({
            jsonrpc: "2.0",
            error: { code: -32000, message: "Method not allowed." },
            id: null,
          }),
        );
      } else {
        next();
      }
    };
  };
