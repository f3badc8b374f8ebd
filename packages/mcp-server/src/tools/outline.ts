import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { type LoggerMethods, outlineMarkdown } from "@newsdoc/engine";
import { z } from "zod";

import { CONFIG_INPUT_SCHEMA, runEngineTool } from "../shared";

export function registerOutlineTool(
  server: McpServer,
  logger: LoggerMethods,
): void {
  server.registerTool(
    "newsdoc_outline",
    {
      description:
        "Paginate markdown without drawing it and return the table of contents entries with their content page numbers.",
      inputSchema: {
        markdown: z.string(),
        config: CONFIG_INPUT_SCHEMA,
      },
    },
    async ({ markdown, config }) =>
      runEngineTool("newsdoc_outline", logger, async () => {
        const outline = await outlineMarkdown(markdown, { config, logger });
        return {
          entries: outline.entries,
          content_page_count: outline.contentPageCount,
        };
      }),
  );
}
