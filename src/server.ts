import { loadConfig } from "./config/config.js";
import { startServer } from "./http/server.js";
import { getLogger } from "./logging/logger.js";

const logger = getLogger("Server");
const config = loadConfig();

const { server, port } = await startServer({ port: config.port, maxItemsets: config.maxItemsets });

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

logger.info({ port }, "listening");
