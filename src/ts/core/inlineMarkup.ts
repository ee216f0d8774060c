/**
 * @fileoverview Inline emphasis and link markup inside paragraphs, list items and titles
 * @module core/inlineMarkup
 *
 * Supported:
 * - *bold* /italic/ =verbatim= ~code~ +strike+ _underline_
 * - [[target]] and [[target][label]]
 *
 * Emphasis only opens after whitespace/opening punctuation and only closes
 * before whitespace/closing punctuation, so "3/4 and 1/2" stays plain text.
 */

export type InlineStyle =
  | "bold"
  | "italic"
  | "verbatim"
  | "code"
  | "strike"
  | "underline";

export type InlineSpan =
  | { kind: "text"; text: string }
  | { kind: "styled"; style: InlineStyle; text: string }
  | { kind: "link"; href: string; label: string };

export type LinkTarget =
  | { kind: "external"; url: string }
  | { kind: "anchor"; key: string };

const EMPHASIS_MARKERS: Record<string, InlineStyle> = {
  "*": "bold",
  "/": "italic",
  "=": "verbatim",
  "~": "code",
  "+": "strike",
  "_": "underline",
};

const OPENING_CONTEXT = /[\s([{"']/;
const CLOSING_CONTEXT = /[\s.,;:!?)\]}"'-]/;
const WHITESPACE = /\s/;
const URL_SCHEME = /^[a-zA-Z][a-zA-Z0-9+.-]*:/;
const FILE_EXTENSION = /\.[A-Za-z0-9]{1,5}$/;

export const IMAGE_EXTENSIONS = ["png", "jpg", "jpeg", "gif", "svg", "webp"];

export function parseInline(text: string): InlineSpan[] {
  const spans: InlineSpan[] = [];
  let buffer = "";

  const flush = (): void => {
    if (buffer.length > 0) {
      spans.push({ kind: "text", text: buffer });
      buffer = "";
    }
  };

  let i = 0;
  while (i < text.length) {
    if (text.startsWith("[[", i)) {
      const close = text.indexOf("]]", i + 2);
      if (close !== -1) {
        flush();
        spans.push({ kind: "link", ...splitLink(text.slice(i + 2, close)) });
        i = close + 2;
        continue;
      }
    }

    const style = EMPHASIS_MARKERS[text[i]];
    if (style && opensAt(text, i)) {
      const end = findClosing(text, i);
      if (end !== -1) {
        flush();
        spans.push({ kind: "styled", style, text: text.slice(i + 1, end) });
        i = end + 1;
        continue;
      }
    }

    buffer += text[i];
    i++;
  }

  flush();
  return spans;
}

/**
 * Every [[...]] link in a piece of text, in order.
 */
export function findLinks(text: string): Array<{ href: string; label: string }> {
  const links: Array<{ href: string; label: string }> = [];
  for (const span of parseInline(text)) {
    if (span.kind === "link") links.push({ href: span.href, label: span.label });
  }
  return links;
}

// "url][label" -> { href: url, label }; "url" -> { href: url, label: url }
export function splitLink(inner: string): { href: string; label: string } {
  const separator = inner.indexOf("][");
  if (separator === -1) {
    return { href: inner, label: inner };
  }
  return { href: inner.slice(0, separator), label: inner.slice(separator + 2) };
}

/**
 * Classify a link target. Anchors must resolve against the document's
 * anchor table; anything with a scheme or a file-like shape is external.
 */
export function classifyLinkTarget(href: string): LinkTarget {
  if (href.startsWith("#")) return { kind: "anchor", key: href };
  if (href.startsWith("*")) return { kind: "anchor", key: `*${href.slice(1).trim()}` };
  if (URL_SCHEME.test(href)) return { kind: "external", url: href };
  if (/^[./~]/.test(href) || FILE_EXTENSION.test(href)) {
    return { kind: "external", url: href };
  }
  return { kind: "anchor", key: `*${href.trim()}` };
}

export function isImagePath(target: string): boolean {
  const path = target.startsWith("file:") ? target.slice("file:".length) : target;
  const dot = path.lastIndexOf(".");
  if (dot === -1) return false;
  return IMAGE_EXTENSIONS.includes(path.slice(dot + 1).toLowerCase());
}

export function spansToPlainText(spans: readonly InlineSpan[]): string {
  return spans.map((span) => (span.kind === "link" ? span.label : span.text)).join("");
}

function opensAt(text: string, i: number): boolean {
  if (i > 0 && !OPENING_CONTEXT.test(text[i - 1])) return false;
  return i + 1 < text.length && !WHITESPACE.test(text[i + 1]);
}

function findClosing(text: string, open: number): number {
  const marker = text[open];
  for (let j = open + 2; j < text.length; j++) {
    if (text[j] !== marker) continue;
    if (WHITESPACE.test(text[j - 1])) continue;
    if (j + 1 === text.length || CLOSING_CONTEXT.test(text[j + 1])) return j;
  }
  return -1;
}
