import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { ERROR_CODES } from "@newsdoc/shared";
import { PDFDocument } from "pdf-lib";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createServer, type NewsdocMcpServer } from "./server.js";

const EXAMPLE = "# Title\n\nSome **bold** text.\n\n## Sub\n- item one\n- item two";

describe("newsdoc mcp server", () => {
  let server: NewsdocMcpServer;
  let client: Client;

  beforeEach(async () => {
    const [clientTransport, serverTransport] =
      InMemoryTransport.createLinkedPair();
    server = createServer({ transportFactory: () => serverTransport });
    client = new Client({ name: "test-client", version: "1.0.0" });
    await server.start();
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
  });

  it("renders markdown to a base64 PDF", async () => {
    const result = await client.callTool({
      name: "newsdoc_render_markdown",
      arguments: { markdown: EXAMPLE, title: "Brief" },
    });
    const payload = readToolTextPayload(result);

    expect(payload).toMatchObject({
      page_count: 3,
      front_page_count: 1,
      toc_page_count: 1,
      content_page_count: 1,
      toc_passes: 1,
      converged: true,
    });
    const base64 = payload.pdf_base64;
    if (typeof base64 !== "string") {
      throw new Error("expected pdf_base64 to be a string");
    }
    const bytes = Buffer.from(base64, "base64");
    expect(payload.byte_length).toBe(bytes.byteLength);
    const pdf = await PDFDocument.load(bytes);
    expect(pdf.getPageCount()).toBe(3);
  });

  it("reports invalid configuration as a tool error with its code", async () => {
    const result = await client.callTool({
      name: "newsdoc_render_markdown",
      arguments: { markdown: EXAMPLE, config: { pageWidth: -10 } },
    });

    expect(result.isError).toBe(true);
    const payload = readToolTextPayload(result);
    expect(payload.error).toMatchObject({
      code: ERROR_CODES.INVALID_RENDER_CONFIG,
    });
  });

  it("renders news records as a report", async () => {
    const result = await client.callTool({
      name: "newsdoc_render_report",
      arguments: {
        title: "Digest",
        source_names: { wire: "The Wire" },
        records: [
          {
            source: "wire",
            title: "Story",
            publishedAt: "2024-05-01",
            bodyMarkdown: "Short body.",
          },
        ],
      },
    });

    expect(result.isError).toBeFalsy();
    expect(readToolTextPayload(result)).toMatchObject({ front_page_count: 1 });
  });

  it("rejects an empty report with the report input code", async () => {
    const result = await client.callTool({
      name: "newsdoc_render_report",
      arguments: { records: [] },
    });

    expect(result.isError).toBe(true);
    expect(readToolTextPayload(result).error).toMatchObject({
      code: ERROR_CODES.INVALID_REPORT_INPUT,
    });
  });

  it("returns the outline with content page numbers", async () => {
    const result = await client.callTool({
      name: "newsdoc_outline",
      arguments: { markdown: EXAMPLE },
    });

    expect(readToolTextPayload(result)).toEqual({
      entries: [
        { text: "Title", level: 1, page: 1 },
        { text: "Sub", level: 2, page: 1 },
      ],
      content_page_count: 1,
    });
  });

  it("serves the default render configuration", async () => {
    const result = await client.readResource({
      uri: "newsdoc://config/defaults",
    });
    const payload = readResourceTextPayload(result);

    expect(payload.defaults).toMatchObject({
      baseFontSize: 11,
      tocMaxLevel: 3,
      tocTitle: "Contents",
    });
    expect(payload.page_sizes).toMatchObject({
      letter: { width: 612, height: 792 },
    });
  });
});

function readToolTextPayload(result: unknown): Record<string, unknown> {
  if (!result || typeof result !== "object" || !("content" in result)) {
    throw new Error("Expected content in tool response");
  }
  const payload = result as {
    content: Array<{ type: string; text?: string }>;
  };
  const firstContent = payload.content.at(0);
  if (!firstContent || firstContent.type !== "text" || !firstContent.text) {
    throw new Error("Expected first tool content item to be text");
  }
  return JSON.parse(firstContent.text) as Record<string, unknown>;
}

function readResourceTextPayload(result: unknown): Record<string, unknown> {
  if (!result || typeof result !== "object" || !("contents" in result)) {
    throw new Error("Expected contents in resource response");
  }
  const payload = result as {
    contents: Array<{ text?: string }>;
  };
  const firstContent = payload.contents.at(0);
  if (!firstContent || typeof firstContent.text !== "string") {
    throw new Error("Expected first resource content item to contain text");
  }
  return JSON.parse(firstContent.text) as Record<string, unknown>;
}
