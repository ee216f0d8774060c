/**
 * @fileoverview Read-only traversal helpers over the slide tree
 * @module core/slideTree
 *
 * Paths are child indices from the document root. Preorder (parent before
 * children, siblings left to right) is the order a presenter walks the deck.
 */

import type { SlidePath } from "./coreTypes";
import type { ContentBlock, OutlineDocument, SlideNode } from "./documentModel";

/**
 * Resolve a path to its node, or null when any index is out of range.
 */
export function nodeAt(
  document: OutlineDocument,
  path: readonly number[]
): SlideNode | null {
  if (path.length === 0) return null;

  let siblings: readonly SlideNode[] = document.slides;
  let node: SlideNode | null = null;

  for (const index of path) {
    if (!Number.isInteger(index) || index < 0 || index >= siblings.length) {
      return null;
    }
    node = siblings[index];
    siblings = node.children;
  }

  return node;
}

export function isValidPath(
  document: OutlineDocument,
  path: readonly number[]
): boolean {
  return nodeAt(document, path) !== null;
}

/**
 * Siblings of the node at path (the root sequence for top-level slides).
 */
export function siblingsOf(
  document: OutlineDocument,
  path: readonly number[]
): readonly SlideNode[] {
  if (path.length <= 1) return document.slides;
  return nodeAt(document, path.slice(0, -1))?.children ?? [];
}

/**
 * Number of reveal steps a block contributes. A fragment list reveals one
 * top-level item per step.
 */
export function blockFragmentSteps(block: ContentBlock): number {
  if (block.fragment === null) return 0;
  if (block.kind === "list") return block.items.length;
  return 1;
}

export function fragmentCount(node: SlideNode): number {
  return node.body.reduce((total, block) => total + blockFragmentSteps(block), 0);
}

/**
 * Follow last children down from path to the deepest descendant.
 */
export function deepestLastPath(
  document: OutlineDocument,
  path: readonly number[]
): SlidePath {
  const result = [...path];
  let node = nodeAt(document, path);

  while (node && node.children.length > 0) {
    result.push(node.children.length - 1);
    node = node.children[node.children.length - 1];
  }

  return result;
}

export function lastPath(document: OutlineDocument): SlidePath {
  return deepestLastPath(document, [document.slides.length - 1]);
}

/**
 * Visit every node in preorder.
 */
export function walkSlides(
  document: OutlineDocument,
  visit: (node: SlideNode, path: SlidePath) => void
): void {
  const walk = (nodes: readonly SlideNode[], prefix: SlidePath): void => {
    nodes.forEach((node, index) => {
      const path = [...prefix, index];
      visit(node, path);
      walk(node.children, path);
    });
  };
  walk(document.slides, []);
}

export function countSlides(document: OutlineDocument): number {
  let total = 0;
  walkSlides(document, () => {
    total++;
  });
  return total;
}

/**
 * 0-based preorder index of the node at path, or -1 when it does not resolve.
 */
export function preorderIndex(
  document: OutlineDocument,
  path: readonly number[]
): number {
  let index = 0;
  let found = -1;

  walkSlides(document, (_node, candidate) => {
    if (found === -1 && candidate.length === path.length &&
        candidate.every((value, i) => value === path[i])) {
      found = index;
    }
    index++;
  });

  return found;
}

/**
 * Image paths referenced anywhere in the deck, in order of first use.
 */
export function collectImagePaths(document: OutlineDocument): string[] {
  const paths = new Set<string>();
  walkSlides(document, (node) => {
    for (const block of node.body) {
      if (block.kind === "image") paths.add(block.path);
    }
  });
  return [...paths];
}
