import { createStderrLogger } from "@newsdoc/engine";

import { createServer } from "./server";

const logger = createStderrLogger("info");
const server = createServer({ logger });

server.start().catch((error: unknown) => {
  logger.error("[McpServer] failed to start", error);
  process.exitCode = 1;
});
