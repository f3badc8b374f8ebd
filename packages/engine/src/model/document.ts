import type {
  Block,
  ContentSection,
  Document,
  HeadingBlock,
  Section,
  TocSection,
} from "@newsdoc/shared";

/**
 * Assembles the section tree while the parser streams blocks in source order.
 * A heading closes every open section at its level or deeper; skipped levels
 * are filled with untitled sections so that children are always exactly one
 * level below their parent.
 */
export class DocumentBuilder {
  private readonly roots: ContentSection[] = [];
  private readonly open: ContentSection[] = [];

  openSection(heading: HeadingBlock): void {
    while (this.open.length > 0 && this.current().level >= heading.level) {
      this.open.pop();
    }

    while (this.open.length + 1 < heading.level) {
      this.attach(createSection(this.open.length + 1, null));
    }

    this.attach(createSection(heading.level, heading));
  }

  append(block: Block): void {
    if (this.open.length === 0) {
      this.attach(createSection(1, null));
    }
    this.current().blocks.push(block);
  }

  build(): Document {
    return { sections: [...this.roots], pages: null, toc: null };
  }

  private current(): ContentSection {
    const section = this.open.at(-1);
    if (!section) {
      throw new Error("no open section");
    }
    return section;
  }

  private attach(section: ContentSection): void {
    const parent = this.open.at(-1);
    if (parent) {
      parent.children.push(section);
    } else {
      this.roots.push(section);
    }
    this.open.push(section);
  }
}

function createSection(
  level: number,
  heading: HeadingBlock | null,
): ContentSection {
  return { role: "content", level, heading, blocks: [], children: [] };
}

export function contentSections(document: Document): ContentSection[] {
  return document.sections.filter(
    (section): section is ContentSection => section.role === "content",
  );
}

export function findTocSection(document: Document): TocSection | null {
  return (
    document.sections.find(
      (section): section is TocSection => section.role === "toc",
    ) ?? null
  );
}

/**
 * Content blocks in reading order: each section's heading, then its own
 * blocks, then its children depth-first. The TOC section is not included.
 */
export function flattenBlocks(document: Document): Block[] {
  const blocks: Block[] = [];
  const visit = (section: ContentSection) => {
    if (section.heading) {
      blocks.push(section.heading);
    }
    blocks.push(...section.blocks);
    section.children.forEach(visit);
  };
  contentSections(document).forEach(visit);
  return blocks;
}

export function sectionTitle(section: Section): string {
  return section.heading?.text ?? "";
}

export function headingBlocks(document: Document): HeadingBlock[] {
  return flattenBlocks(document).filter(
    (block): block is HeadingBlock => block.kind === "heading",
  );
}
