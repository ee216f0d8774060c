/**
 * @fileoverview In-memory model of a parsed deck
 * @module core/documentModel
 *
 * Everything here is produced once by the outline parser and never mutated
 * afterwards. A reload builds a fresh OutlineDocument.
 */

import type { SlidePath } from "./coreTypes";

/**
 * Fragment marker from `#+ATTR_REVEAL: :frag ...`. For lists, styles[i]
 * applies to top-level item i (the last style repeats).
 */
export interface FragmentSpec {
  readonly styles: readonly string[];
}

export interface ListItem {
  readonly text: string;
  readonly children: readonly ListItem[];
}

export interface ParagraphBlock {
  readonly kind: "paragraph";
  readonly text: string;
  readonly fragment: FragmentSpec | null;
}

export interface ListBlock {
  readonly kind: "list";
  readonly ordered: boolean;
  readonly items: readonly ListItem[];
  readonly fragment: FragmentSpec | null;
}

export interface ImageBlock {
  readonly kind: "image";
  readonly path: string;
  readonly caption: string | null;
  readonly fragment: FragmentSpec | null;
}

export interface QuoteBlock {
  readonly kind: "quote";
  readonly text: string;
  readonly attribution: string | null;
  readonly fragment: FragmentSpec | null;
}

export interface CodeBlock {
  readonly kind: "code";
  readonly language: string | null;
  readonly text: string;
  readonly fragment: FragmentSpec | null;
}

export interface LinkBlock {
  readonly kind: "link";
  readonly url: string;
  readonly label: string;
  // Resolved slide for internal links, null for external ones
  readonly target: SlidePath | null;
  readonly fragment: FragmentSpec | null;
}

export type ContentBlock =
  | ParagraphBlock
  | ListBlock
  | ImageBlock
  | QuoteBlock
  | CodeBlock
  | LinkBlock;

export interface SlideNode {
  readonly title: string | null;
  readonly depth: number;
  readonly body: readonly ContentBlock[];
  readonly children: readonly SlideNode[];
  readonly tags: readonly string[];
  readonly properties: Readonly<Record<string, string>>;
  readonly notes: string | null;
  /** 1-based line of the heading in the source */
  readonly line: number;
}

export interface OutlineDocument {
  readonly title: string | null;
  readonly author: string | null;
  /** `#+KEY: value` lines from the preamble, keys upper-cased */
  readonly keywords: Readonly<Record<string, string>>;
  readonly slides: readonly SlideNode[];
  /** `#custom-id` and `*Heading title` keys to slide paths */
  readonly anchors: Readonly<Record<string, SlidePath>>;
}
