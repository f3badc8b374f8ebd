import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { type LoggerMethods, renderReport } from "@newsdoc/engine";
import { z } from "zod";

import { CONFIG_INPUT_SCHEMA, runEngineTool, toRenderPayload } from "../shared";

export function registerRenderReportTool(
  server: McpServer,
  logger: LoggerMethods,
): void {
  server.registerTool(
    "newsdoc_render_report",
    {
      description:
        "Compose news records (source, title, publishedAt, url, bodyMarkdown) into one report grouped by source and render it as a PDF with a title page.",
      inputSchema: {
        records: z
          .array(z.record(z.unknown()))
          .describe("News records, validated by the engine."),
        title: z.string().min(1).optional(),
        source_names: z
          .record(z.string())
          .optional()
          .describe("Display names keyed by record source."),
        config: CONFIG_INPUT_SCHEMA,
      },
    },
    async ({ records, title, source_names, config }) =>
      runEngineTool("newsdoc_render_report", logger, async () =>
        toRenderPayload(
          await renderReport(records, {
            title,
            sourceNames: source_names,
            config,
            logger,
          }),
        ),
      ),
  );
}
