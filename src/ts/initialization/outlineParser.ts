/**
 * @fileoverview Outline markup parsing into the slide tree
 * @module initialization/outlineParser
 *
 * Turns an Org-style outline deck into an OutlineDocument. Parsing is a pure
 * function of the input text: no logging, no I/O. Image assets are not
 * checked here; a missing file only shows up as a placeholder when rendered.
 *
 * Three passes:
 * 1. Line scan builds mutable slide builders (headings, blocks, drawers)
 * 2. Anchor table from CUSTOM_ID properties and heading titles; every
 *    internal link reference must resolve against it
 * 3. Builders are frozen into readonly SlideNodes with link targets filled in
 *
 * Any structural problem throws ParseError with the offending line.
 */

import type { SlidePath } from '../core/coreTypes';
import type {
  ContentBlock,
  FragmentSpec,
  OutlineDocument,
  SlideNode,
} from '../core/documentModel';
import { classifyLinkTarget, findLinks, isImagePath } from '../core/inlineMarkup';

// ============================================================================
// ERROR CLASSES
// ============================================================================

/**
 * Error thrown when the outline cannot be turned into a slide tree
 */
export class ParseError extends Error {
  public readonly line: number;
  public readonly region: string;
  public readonly reason: string;

  constructor(reason: string, line: number, region: string) {
    super(`Parse error at line ${line}: ${reason}` + (region ? `\n  ${region}` : ''));
    this.name = 'ParseError';
    this.reason = reason;
    this.line = line;
    this.region = region;
  }
}

// ============================================================================
// PATTERNS
// ============================================================================

const HEADING = /^(\*+)(?:\s+(.*))?$/;
const HEADING_TAGS = /^(.*?)\s+(:(?:[\w@#%]+:)+)\s*$/;
const BLOCK_BEGIN = /^\s*#\+begin_(\w+)(?:\s+(.*))?$/i;
const BLOCK_END = /^\s*#\+end_(\w+)\s*$/i;
const KEYWORD = /^\s*#\+(\w+):\s*(.*)$/;
const COMMENT = /^\s*#(\s|$|\+)/;
const LIST_ITEM = /^(\s*)([-+]|\d+[.)])\s+(.*)$/;
const STANDALONE_LINK = /^\s*\[\[([^\]]+)\](?:\[([^\]]+)\])?\]\s*$/;
const DRAWER_START = /^\s*:PROPERTIES:\s*$/i;
const DRAWER_END = /^\s*:END:\s*$/i;
const DRAWER_ENTRY = /^\s*:([\w-]+):\s*(.*)$/;
const FRAGMENT_OPTION = /:frag\s+(\([^)]*\)|\S+)/;
const COMMA_ESCAPE = /^(\s*),(\*|#\+)/;

/**
 * Delimited blocks whose contents are taken verbatim. Any other
 * #+BEGIN_x / #+END_x pair is transparent.
 */
const VERBATIM_BLOCKS = new Set(['QUOTE', 'SRC', 'EXAMPLE', 'NOTES']);

const NO_EXPORT_TAG = 'noexport';

// ============================================================================
// BUILDER TYPES
// ============================================================================

interface MutableListItem {
  text: string;
  children: MutableListItem[];
}

interface OpenList {
  ordered: boolean;
  items: MutableListItem[];
  // Open items by indentation, innermost last
  stack: Array<{ indent: number; item: MutableListItem }>;
}

interface SlideBuilder {
  title: string | null;
  depth: number;
  body: ContentBlock[];
  children: SlideBuilder[];
  tags: string[];
  properties: Record<string, string>;
  notes: string[];
  line: number;
}

interface LinkReference {
  href: string;
  key: string;
  line: number;
  region: string;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Parse outline markup into a slide tree.
 *
 * @throws {ParseError} On malformed heading nesting, unterminated blocks,
 *   unresolvable internal links, content outside any slide, or an empty deck
 */
export function parseOutline(source: string): OutlineDocument {
  const scanner = new OutlineScanner(source.replace(/^\uFEFF/, '').split(/\r?\n/));
  scanner.scan();

  if (scanner.roots.length === 0) {
    throw new ParseError('document contains no slides', Math.max(scanner.lineCount, 1), '');
  }

  const anchors = buildAnchors(scanner.roots);

  for (const reference of scanner.references) {
    if (!anchors.has(reference.key)) {
      throw new ParseError(
        `unresolvable link reference "${reference.href}"`,
        reference.line,
        reference.region
      );
    }
  }

  const keywords = scanner.keywords;
  return {
    title: keywords.TITLE ?? null,
    author: keywords.AUTHOR ?? null,
    keywords,
    slides: scanner.roots.map((builder) => freezeSlide(builder, anchors)),
    anchors: Object.fromEntries(anchors),
  };
}

// ============================================================================
// PASS 1: LINE SCAN
// ============================================================================

class OutlineScanner {
  readonly roots: SlideBuilder[] = [];
  readonly references: LinkReference[] = [];
  readonly keywords: Record<string, string> = {};

  // open headings; openHeadings[d] is the open slide at depth d
  private openHeadings: SlideBuilder[] = [];
  private paragraph: string[] = [];
  private list: OpenList | null = null;
  private pendingFragment: FragmentSpec | null = null;
  private pendingCaption: string | null = null;
  // depth of a noexport heading whose subtree is being skipped
  private skipDepth: number | null = null;

  constructor(private readonly lines: string[]) {}

  get lineCount(): number {
    return this.lines.length;
  }

  private get current(): SlideBuilder | null {
    return this.openHeadings[this.openHeadings.length - 1] ?? null;
  }

  scan(): void {
    for (let index = 0; index < this.lines.length; index++) {
      index = this.scanLine(index);
    }
    this.flushOpenBlocks();
  }

  /**
   * Handle the line at index; returns the index of the last line consumed.
   */
  private scanLine(index: number): number {
    const raw = this.lines[index];
    const lineNo = index + 1;

    const heading = HEADING.exec(raw);
    if (this.skipDepth !== null) {
      if (!heading || heading[1].length - 1 > this.skipDepth) {
        return this.skipLine(index);
      }
      this.skipDepth = null;
    }

    if (heading) {
      return this.openHeading(index, heading[1].length - 1, heading[2] ?? '');
    }

    const begin = BLOCK_BEGIN.exec(raw);
    if (begin) {
      return this.readDelimitedBlock(index, begin[1].toUpperCase(), (begin[2] ?? '').trim());
    }

    const end = BLOCK_END.exec(raw);
    if (end) {
      const name = end[1].toUpperCase();
      if (VERBATIM_BLOCKS.has(name)) {
        throw new ParseError(`#+END_${name} without a matching #+BEGIN_${name}`, lineNo, raw.trim());
      }
      return index;
    }

    const keyword = KEYWORD.exec(raw);
    if (keyword) {
      this.flushOpenBlocks();
      this.applyKeyword(keyword[1].toUpperCase(), keyword[2].trim());
      return index;
    }

    if (COMMENT.test(raw)) {
      return index;
    }

    if (raw.trim() === '') {
      this.flushOpenBlocks();
      return index;
    }

    const slide = this.requireSlide(lineNo, raw);

    const link = STANDALONE_LINK.exec(raw);
    if (link) {
      this.flushOpenBlocks();
      this.addStandaloneLink(slide, link[1], link[2] ?? null, lineNo, raw);
      return index;
    }

    const item = LIST_ITEM.exec(raw);
    if (item) {
      this.flushParagraph();
      this.addListItem(item[1].length, item[2], item[3].trim(), lineNo, raw);
      return index;
    }

    if (this.list && indentOf(raw) > this.innermostListIndent()) {
      const open = this.list.stack[this.list.stack.length - 1];
      open.item.text = `${open.item.text} ${raw.trim()}`;
      this.recordInlineLinks(raw, lineNo);
      return index;
    }

    this.flushList();
    this.paragraph.push(raw.trim());
    this.recordInlineLinks(raw, lineNo);
    return index;
  }

  private openHeading(index: number, depth: number, text: string): number {
    const lineNo = index + 1;
    const raw = this.lines[index];

    this.flushOpenBlocks();
    this.pendingFragment = null;
    this.pendingCaption = null;

    const maxDepth = this.openHeadings.length;
    if (depth > maxDepth) {
      throw new ParseError(
        maxDepth === 0
          ? `first heading must be at depth 0 (one star), found depth ${depth}`
          : `heading at depth ${depth} has no parent at depth ${depth - 1}`,
        lineNo,
        raw.trim()
      );
    }
    this.openHeadings.length = depth;

    const { title, tags } = splitHeadingText(text);
    if (tags.includes(NO_EXPORT_TAG)) {
      this.skipDepth = depth;
      return index;
    }

    const builder: SlideBuilder = {
      title,
      depth,
      body: [],
      children: [],
      tags,
      properties: {},
      notes: [],
      line: lineNo,
    };

    const parent = this.openHeadings[depth - 1];
    if (parent) {
      parent.children.push(builder);
    } else {
      this.roots.push(builder);
    }
    this.openHeadings.push(builder);

    return this.readPropertyDrawer(index, builder);
  }

  private readPropertyDrawer(headingIndex: number, builder: SlideBuilder): number {
    const start = headingIndex + 1;
    if (start >= this.lines.length || !DRAWER_START.test(this.lines[start])) {
      return headingIndex;
    }

    for (let index = start + 1; index < this.lines.length; index++) {
      const line = this.lines[index];
      if (DRAWER_END.test(line)) {
        return index;
      }
      if (HEADING.test(line)) break;

      const entry = DRAWER_ENTRY.exec(line);
      if (entry) {
        builder.properties[entry[1].toUpperCase()] = entry[2].trim();
      }
    }

    throw new ParseError('unterminated :PROPERTIES: drawer', start + 1, this.lines[start].trim());
  }

  private readDelimitedBlock(index: number, name: string, args: string): number {
    const lineNo = index + 1;
    const raw = this.lines[index];
    this.flushOpenBlocks();

    const endIndex = this.findBlockEnd(index + 1, name);
    if (endIndex === -1) {
      throw new ParseError(`unterminated #+BEGIN_${name} block`, lineNo, raw.trim());
    }

    if (!VERBATIM_BLOCKS.has(name)) {
      // Transparent wrapper: contents are scanned like any other lines
      return index;
    }

    const slide = this.requireSlide(lineNo, raw);
    const contents = this.lines.slice(index + 1, endIndex);

    switch (name) {
      case 'SRC':
      case 'EXAMPLE': {
        const language = name === 'SRC' ? args.split(/\s+/)[0] || null : null;
        slide.body.push({
          kind: 'code',
          language,
          text: contents.map((line) => line.replace(COMMA_ESCAPE, '$1$2')).join('\n'),
          fragment: this.takeFragment(),
        });
        break;
      }
      case 'QUOTE': {
        const { text, attribution } = splitAttribution(trimBlankEdges(contents));
        slide.body.push({ kind: 'quote', text, attribution, fragment: this.takeFragment() });
        break;
      }
      case 'NOTES':
        slide.notes.push(trimBlankEdges(contents).join('\n'));
        break;
    }

    return endIndex;
  }

  /**
   * Inside a dropped subtree, verbatim blocks are still consumed whole so a
   * heading-like line in their contents does not end the skip.
   */
  private skipLine(index: number): number {
    const begin = BLOCK_BEGIN.exec(this.lines[index]);
    if (!begin) return index;

    const name = begin[1].toUpperCase();
    if (!VERBATIM_BLOCKS.has(name)) return index;

    const endIndex = this.findBlockEnd(index + 1, name);
    if (endIndex === -1) {
      throw new ParseError(`unterminated #+BEGIN_${name} block`, index + 1, this.lines[index].trim());
    }
    return endIndex;
  }

  private findBlockEnd(from: number, name: string): number {
    for (let index = from; index < this.lines.length; index++) {
      const end = BLOCK_END.exec(this.lines[index]);
      if (end && end[1].toUpperCase() === name) return index;
    }
    return -1;
  }

  private applyKeyword(key: string, value: string): void {
    switch (key) {
      case 'ATTR_REVEAL':
        this.pendingFragment = parseFragmentOption(value);
        return;
      case 'CAPTION':
        this.pendingCaption = value;
        return;
    }

    // Only preamble keywords describe the document
    if (this.roots.length === 0) {
      this.keywords[key] = value;
    }
  }

  private addStandaloneLink(
    slide: SlideBuilder,
    target: string,
    label: string | null,
    lineNo: number,
    raw: string
  ): void {
    if (label === null && isImagePath(target)) {
      const caption = this.pendingCaption;
      slide.body.push({
        kind: 'image',
        path: target.startsWith('file:') ? target.slice('file:'.length) : target,
        caption,
        fragment: this.takeFragment(),
      });
      return;
    }

    slide.body.push({
      kind: 'link',
      url: target,
      label: label ?? target,
      target: null,
      fragment: this.takeFragment(),
    });
    this.recordReference(target, lineNo, raw);
  }

  private addListItem(indent: number, bullet: string, text: string, lineNo: number, raw: string): void {
    if (!this.list) {
      this.list = { ordered: /\d/.test(bullet), items: [], stack: [] };
    }

    const list = this.list;
    const item: MutableListItem = { text, children: [] };

    while (list.stack.length > 0 && list.stack[list.stack.length - 1].indent >= indent) {
      list.stack.pop();
    }

    const parent = list.stack[list.stack.length - 1];
    if (parent) {
      parent.item.children.push(item);
    } else {
      list.items.push(item);
    }
    list.stack.push({ indent, item });

    this.recordInlineLinks(raw, lineNo);
  }

  private innermostListIndent(): number {
    const stack = this.list?.stack ?? [];
    return stack.length > 0 ? stack[stack.length - 1].indent : -1;
  }

  private flushOpenBlocks(): void {
    this.flushParagraph();
    this.flushList();
  }

  private flushParagraph(): void {
    if (this.paragraph.length === 0) return;
    const slide = this.current;
    if (slide) {
      slide.body.push({
        kind: 'paragraph',
        text: this.paragraph.join(' '),
        fragment: this.takeFragment(),
      });
    }
    this.paragraph = [];
  }

  private flushList(): void {
    if (!this.list) return;
    const slide = this.current;
    if (slide) {
      slide.body.push({
        kind: 'list',
        ordered: this.list.ordered,
        items: this.list.items,
        fragment: this.takeFragment(),
      });
    }
    this.list = null;
  }

  // ATTR_REVEAL and CAPTION attach to the next emitted block only
  private takeFragment(): FragmentSpec | null {
    const fragment = this.pendingFragment;
    this.pendingFragment = null;
    this.pendingCaption = null;
    return fragment;
  }

  private requireSlide(lineNo: number, raw: string): SlideBuilder {
    const slide = this.current;
    if (!slide) {
      throw new ParseError('content before the first heading', lineNo, raw.trim());
    }
    return slide;
  }

  private recordInlineLinks(raw: string, lineNo: number): void {
    for (const link of findLinks(raw)) {
      this.recordReference(link.href, lineNo, raw);
    }
  }

  private recordReference(href: string, line: number, raw: string): void {
    const target = classifyLinkTarget(href);
    if (target.kind === 'anchor') {
      this.references.push({ href, key: target.key, line, region: raw.trim() });
    }
  }
}

// ============================================================================
// PASS 2: ANCHORS
// ============================================================================

function buildAnchors(roots: SlideBuilder[]): Map<string, SlidePath> {
  const anchors = new Map<string, SlidePath>();

  const visit = (builders: SlideBuilder[], prefix: SlidePath): void => {
    builders.forEach((builder, index) => {
      const path = [...prefix, index];

      const customId = builder.properties.CUSTOM_ID;
      if (customId) {
        const key = `#${customId}`;
        if (anchors.has(key)) {
          throw new ParseError(`duplicate CUSTOM_ID "${customId}"`, builder.line, `:CUSTOM_ID: ${customId}`);
        }
        anchors.set(key, path);
      }

      // First heading with a given title wins
      if (builder.title !== null && !anchors.has(`*${builder.title}`)) {
        anchors.set(`*${builder.title}`, path);
      }

      visit(builder.children, path);
    });
  };

  visit(roots, []);
  return anchors;
}

// ============================================================================
// PASS 3: FREEZE
// ============================================================================

function freezeSlide(builder: SlideBuilder, anchors: Map<string, SlidePath>): SlideNode {
  return {
    title: builder.title,
    depth: builder.depth,
    body: builder.body.map((block) => (block.kind === 'link' ? resolveLinkBlock(block, anchors) : block)),
    children: builder.children.map((child) => freezeSlide(child, anchors)),
    tags: builder.tags,
    properties: builder.properties,
    notes: builder.notes.length > 0 ? builder.notes.join('\n\n') : null,
    line: builder.line,
  };
}

function resolveLinkBlock(
  block: Extract<ContentBlock, { kind: 'link' }>,
  anchors: Map<string, SlidePath>
): ContentBlock {
  const target = classifyLinkTarget(block.url);
  if (target.kind !== 'anchor') return block;
  const path = anchors.get(target.key);
  return { ...block, target: path ? [...path] : null };
}

// ============================================================================
// HELPERS
// ============================================================================

function splitHeadingText(text: string): { title: string | null; tags: string[] } {
  const trimmed = text.trim();
  const tagged = HEADING_TAGS.exec(trimmed);

  if (tagged) {
    return {
      title: tagged[1].trim() || null,
      tags: tagged[2].split(':').filter((tag) => tag.length > 0),
    };
  }

  // A heading made only of tags, e.g. "* :noexport:"
  if (/^(:(?:[\w@#%]+:)+)$/.test(trimmed)) {
    return { title: null, tags: trimmed.split(':').filter((tag) => tag.length > 0) };
  }

  return { title: trimmed || null, tags: [] };
}

function parseFragmentOption(value: string): FragmentSpec | null {
  const match = FRAGMENT_OPTION.exec(value);
  if (!match) return null;

  const styles = match[1]
    .replace(/^\(|\)$/g, '')
    .split(/\s+/)
    .filter((style) => style.length > 0);

  if (styles.length === 0 || (styles.length === 1 && styles[0] === 'none')) {
    return null;
  }
  return { styles };
}

function splitAttribution(lines: string[]): { text: string; attribution: string | null } {
  const last = lines[lines.length - 1];
  const match = last === undefined ? null : /^\s*(?:--|—)\s+(.+)$/.exec(last);

  if (!match) {
    return { text: lines.join('\n'), attribution: null };
  }
  return {
    text: trimBlankEdges(lines.slice(0, -1)).join('\n'),
    attribution: match[1].trim(),
  };
}

function trimBlankEdges(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === '') start++;
  while (end > start && lines[end - 1].trim() === '') end--;
  return lines.slice(start, end);
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}
