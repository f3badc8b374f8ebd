import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { DEFAULT_RENDER_CONFIG } from "@newsdoc/engine";
import { PAGE_SIZES } from "@newsdoc/shared";

import { makeResourceResult } from "../shared";

export const CONFIG_DEFAULTS_URI = "newsdoc://config/defaults";

export function registerConfigDefaultsResource(server: McpServer): void {
  server.registerResource(
    "newsdoc-config-defaults",
    CONFIG_DEFAULTS_URI,
    {
      title: "Render Defaults",
      description: "Default render configuration and the named page sizes.",
      mimeType: "application/json",
    },
    async (uri) =>
      makeResourceResult(uri, {
        defaults: DEFAULT_RENDER_CONFIG,
        page_sizes: PAGE_SIZES,
      }),
  );
}
