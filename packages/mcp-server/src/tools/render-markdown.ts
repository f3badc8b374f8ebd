import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { type LoggerMethods, renderMarkdown } from "@newsdoc/engine";
import { z } from "zod";

import { CONFIG_INPUT_SCHEMA, runEngineTool, toRenderPayload } from "../shared";

export function registerRenderMarkdownTool(
  server: McpServer,
  logger: LoggerMethods,
): void {
  server.registerTool(
    "newsdoc_render_markdown",
    {
      description:
        "Render markdown into a paginated PDF with a table of contents. Returns the PDF base64-encoded with page statistics.",
      inputSchema: {
        markdown: z.string().describe("Markdown document body."),
        title: z
          .string()
          .min(1)
          .optional()
          .describe("Adds a title page with this title."),
        subtitle: z.string().optional(),
        author: z.string().optional(),
        config: CONFIG_INPUT_SCHEMA,
      },
    },
    async ({ markdown, title, subtitle, author, config }) =>
      runEngineTool("newsdoc_render_markdown", logger, async () =>
        toRenderPayload(
          await renderMarkdown(markdown, {
            config,
            metadata: title ? { title, subtitle, author } : undefined,
            logger,
          }),
        ),
      ),
  );
}
