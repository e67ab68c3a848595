import path from "node:path";
import dotenv from "dotenv";
import { createApp } from "./app.js";
import type { ServerConfig } from "./config.js";
import { ConfigError, loadConfig } from "./config.js";

// .env from the working directory; real environment variables win
dotenv.config({ path: path.join(process.cwd(), ".env") });

function loadConfigOrExit(): ServerConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[Server] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const config = loadConfigOrExit();
const app = createApp(config);

const server = app.listen(config.port, () => {
  console.log(`[Server] MCP endpoint at http://localhost:${config.port}/mcp (${config.env}, estimator: ${config.estimatorBaseUrl})`);
});

process.on("SIGINT", () => {
  server.close(() => {
    console.log("[Server] Shutdown complete");
    process.exit(0);
  });
});
