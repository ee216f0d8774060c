/**
 * @fileoverview Projection of a slide node into a surface-independent frame
 * @module ui/frameRenderer
 *
 * render(node, fragmentIndex) is pure: same node and index, same frame.
 * Surfaces (DOM, tests) only ever see VisualFrames, never ContentBlocks.
 *
 * - Blocks without a fragment marker are always shown
 * - Fragment blocks appear once revealed; fragment lists grow item by item
 * - Code is highlighted by highlight.js when the language is registered,
 *   otherwise it stays plain monospaced text
 * - Images go through an AssetResolver; missing ones become placeholders
 */

import hljs from 'highlight.js';
import type { ContentBlock, ListItem, SlideNode } from '../core/documentModel';
import { parseInline, type InlineSpan } from '../core/inlineMarkup';
import { blockFragmentSteps, fragmentCount } from '../core/slideTree';

// ============================================================================
// FRAME TYPES
// ============================================================================

export interface FrameListItem {
  spans: InlineSpan[];
  children: FrameListItem[];
  // Style of the fragment step that revealed this item, null if not a fragment
  fragmentStyle: string | null;
}

export type FrameBlock =
  | { kind: 'paragraph'; spans: InlineSpan[]; fragmentStyle: string | null }
  | { kind: 'list'; ordered: boolean; items: FrameListItem[]; fragmentStyle: string | null }
  | {
      kind: 'image';
      path: string;
      src: string | null;
      missing: boolean;
      caption: string | null;
      placeholder: string | null;
      fragmentStyle: string | null;
    }
  | { kind: 'quote'; text: string; attribution: string | null; fragmentStyle: string | null }
  | {
      kind: 'code';
      language: string | null;
      text: string;
      // highlight.js markup (already escaped) when highlighted is true
      html: string | null;
      highlighted: boolean;
      fragmentStyle: string | null;
    }
  | {
      kind: 'link';
      href: string;
      label: string;
      target: number[] | null;
      fragmentStyle: string | null;
    };

export interface VisualFrame {
  title: InlineSpan[] | null;
  depth: number;
  blocks: FrameBlock[];
  fragments: { revealed: number; total: number };
  notes: string | null;
}

// ============================================================================
// ASSETS
// ============================================================================

export type AssetResolution =
  | { status: 'resolved'; src: string }
  | { status: 'missing' };

export type AssetResolver = (path: string) => AssetResolution;

/**
 * Treat every path as present, as written. Failures surface lazily when
 * the surface tries to load the image.
 */
export const passThroughAssets: AssetResolver = (path) => ({ status: 'resolved', src: path });

/**
 * Resolve paths against a base URL, using the result of an earlier probe
 * (see deckLoader.probeAssets) to mark unreachable assets as missing.
 */
export function createProbedAssetResolver(
  baseUrl: string,
  availability: ReadonlyMap<string, boolean>
): AssetResolver {
  return (path) => {
    if (availability.get(path) === false) {
      return { status: 'missing' };
    }
    try {
      return { status: 'resolved', src: new URL(path, baseUrl).href };
    } catch (error) {
      if (error instanceof TypeError) {
        return { status: 'missing' };
      }
      throw error;
    }
  };
}

// ============================================================================
// RENDERER
// ============================================================================

export interface RendererOptions {
  resolveAsset?: AssetResolver;
  highlight?: boolean;
  languageAliases?: Record<string, string>;
  placeholderText?: string;
}

export class FrameRenderer {
  private readonly resolveAsset: AssetResolver;
  private readonly highlight: boolean;
  private readonly languageAliases: Record<string, string>;
  private readonly placeholderText: string;

  constructor(options: RendererOptions = {}) {
    this.resolveAsset = options.resolveAsset ?? passThroughAssets;
    this.highlight = options.highlight ?? true;
    this.languageAliases = options.languageAliases ?? {};
    this.placeholderText = options.placeholderText ?? 'Image unavailable';
  }

  render(node: SlideNode, fragmentIndex: number): VisualFrame {
    const total = fragmentCount(node);
    const revealed = Math.min(Math.max(Math.floor(fragmentIndex), 0), total);

    const blocks: FrameBlock[] = [];
    // Fragment steps consumed by blocks before the current one
    let step = 0;

    for (const block of node.body) {
      const steps = blockFragmentSteps(block);

      if (block.fragment === null) {
        blocks.push(this.renderBlock(block, null));
        continue;
      }

      const visibleSteps = Math.min(Math.max(revealed - step, 0), steps);
      step += steps;
      if (visibleSteps === 0) continue;

      const styles = block.fragment.styles;
      if (block.kind === 'list') {
        blocks.push({
          kind: 'list',
          ordered: block.ordered,
          items: block.items
            .slice(0, visibleSteps)
            .map((item, i) => renderListItem(item, styleAt(styles, i))),
          fragmentStyle: styleAt(styles, 0),
        });
      } else {
        blocks.push(this.renderBlock(block, styleAt(styles, 0)));
      }
    }

    return {
      title: node.title === null ? null : parseInline(node.title),
      depth: node.depth,
      blocks,
      fragments: { revealed, total },
      notes: node.notes,
    };
  }

  private renderBlock(block: ContentBlock, fragmentStyle: string | null): FrameBlock {
    switch (block.kind) {
      case 'paragraph':
        return { kind: 'paragraph', spans: parseInline(block.text), fragmentStyle };

      case 'list':
        return {
          kind: 'list',
          ordered: block.ordered,
          items: block.items.map((item) => renderListItem(item, null)),
          fragmentStyle,
        };

      case 'image': {
        const resolution = this.resolveAsset(block.path);
        if (resolution.status === 'missing') {
          return {
            kind: 'image',
            path: block.path,
            src: null,
            missing: true,
            caption: block.caption,
            placeholder: this.placeholderText,
            fragmentStyle,
          };
        }
        return {
          kind: 'image',
          path: block.path,
          src: resolution.src,
          missing: false,
          caption: block.caption,
          placeholder: null,
          fragmentStyle,
        };
      }

      case 'quote':
        return { kind: 'quote', text: block.text, attribution: block.attribution, fragmentStyle };

      case 'code':
        return this.renderCode(block.language, block.text, fragmentStyle);

      case 'link':
        return {
          kind: 'link',
          href: block.url,
          label: block.label,
          target: block.target === null ? null : [...block.target],
          fragmentStyle,
        };
    }
  }

  private renderCode(language: string | null, text: string, fragmentStyle: string | null): FrameBlock {
    const resolved = this.resolveLanguage(language);

    if (resolved === null) {
      return { kind: 'code', language, text, html: null, highlighted: false, fragmentStyle };
    }

    const html = hljs.highlight(text, { language: resolved, ignoreIllegals: true }).value;
    return { kind: 'code', language, text, html, highlighted: true, fragmentStyle };
  }

  // Registered highlight.js language for a deck tag, or null
  private resolveLanguage(language: string | null): string | null {
    if (!this.highlight || language === null) return null;
    const tag = language.toLowerCase();
    const name = this.languageAliases[tag] ?? tag;
    return hljs.getLanguage(name) ? name : null;
  }
}

/**
 * Render with default options.
 */
export function render(node: SlideNode, fragmentIndex: number, options: RendererOptions = {}): VisualFrame {
  return new FrameRenderer(options).render(node, fragmentIndex);
}

function renderListItem(item: ListItem, fragmentStyle: string | null): FrameListItem {
  return {
    spans: parseInline(item.text),
    children: item.children.map((child) => renderListItem(child, null)),
    fragmentStyle,
  };
}

function styleAt(styles: readonly string[], index: number): string {
  return styles[Math.min(index, styles.length - 1)] ?? 'appear';
}
