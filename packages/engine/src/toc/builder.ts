import type {
  Document,
  HeadingBlock,
  ListItemBlock,
  TocEntry,
  TocSection,
} from "@newsdoc/shared";
import type { RenderConfig } from "../config";
import { headingBlocks } from "../model/document";
import { resolveStyle } from "../style/resolver";

/**
 * Lists every content heading up to `config.tocMaxLevel` with the content
 * page it starts on, and appends the listing as the document's TOC section.
 * A TOC section from an earlier run is replaced.
 */
export function buildToc(document: Document, config: RenderConfig): Document {
  const entries: TocEntry[] = headingBlocks(document)
    .filter((heading) => heading.level <= config.tocMaxLevel)
    .map((heading) => {
      if (!heading.assignment) {
        throw new Error(
          `heading "${heading.text}" has no page; paginate before building the TOC`,
        );
      }
      return {
        text: heading.text,
        level: heading.level,
        pageIndex: heading.assignment.pageIndex,
        heading,
      };
    });

  const title: HeadingBlock = {
    kind: "heading",
    level: 1,
    text: config.tocTitle,
    style: null,
    assignment: null,
  };
  title.style = resolveStyle(title, config);

  const section: TocSection = {
    role: "toc",
    level: 1,
    heading: title,
    blocks: entries.map((entry) => tocLine(entry, config)),
    entries,
  };

  const kept = document.sections.filter((existing) => existing.role !== "toc");
  document.sections.splice(0, document.sections.length, ...kept, section);
  document.toc = entries;
  return document;
}

function tocLine(entry: TocEntry, config: RenderConfig): ListItemBlock {
  const block: ListItemBlock = {
    kind: "listItem",
    marker: "unordered",
    ordinal: null,
    depth: entry.level - 1,
    group: 0,
    runs: [{ kind: "plain", text: entry.text }],
    style: null,
    assignment: null,
  };
  block.style = resolveStyle(block, config);
  return block;
}
