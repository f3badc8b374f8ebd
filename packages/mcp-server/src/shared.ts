import {
  type EngineError,
  isEngineError,
  type LoggerMethods,
  type RenderResult,
} from "@newsdoc/engine";
import { z } from "zod";

/** Raw render options; the engine validates them. */
export const CONFIG_INPUT_SCHEMA = z
  .record(z.unknown())
  .optional()
  .describe(
    "Render options: pageSize (a4|letter|legal), pageWidth, pageHeight, margins, baseFontSize, lineHeightRatio, indentStep, tocMaxLevel, maxNestingDepth, tocTitle, tocPageNumbers (content|absolute), pageBreakBeforeLevel (1-6 or null).",
  );

export type ToolPayload = Record<string, unknown>;

export function makeToolResult(payload: ToolPayload) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload) }],
    structuredContent: payload,
  };
}

export function makeToolError(error: EngineError) {
  const payload = {
    error: {
      code: error.code,
      message: error.message,
    },
  };
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload) }],
    isError: true,
  };
}

/**
 * Runs an engine call for a tool. Engine errors become tool errors carrying
 * their code; anything else propagates to the SDK.
 */
export async function runEngineTool(
  tool: string,
  logger: LoggerMethods,
  call: () => Promise<ToolPayload>,
) {
  try {
    return makeToolResult(await call());
  } catch (error) {
    if (isEngineError(error)) {
      logger.warn(`[McpServer] ${tool} rejected: ${error.message}`);
      return makeToolError(error);
    }
    throw error;
  }
}

export function toRenderPayload(result: RenderResult): ToolPayload {
  return {
    pdf_base64: Buffer.from(result.bytes).toString("base64"),
    byte_length: result.bytes.byteLength,
    page_count: result.pageCount,
    front_page_count: result.frontPageCount,
    toc_page_count: result.tocPageCount,
    content_page_count: result.contentPageCount,
    toc_passes: result.tocPasses,
    converged: result.converged,
  };
}

export function makeResourceResult(uri: URL, payload: unknown) {
  return {
    contents: [
      {
        uri: uri.toString(),
        mimeType: "application/json",
        text: JSON.stringify(payload ?? null),
      },
    ],
  };
}
