// src/ts/core/slideTree.test.ts
import { describe, it, expect } from 'vitest';
import { parseOutline } from '../initialization/outlineParser';
import {
  blockFragmentSteps,
  collectImagePaths,
  countSlides,
  deepestLastPath,
  fragmentCount,
  isValidPath,
  lastPath,
  nodeAt,
  preorderIndex,
  siblingsOf,
  walkSlides,
} from './slideTree';

const DECK = [
  '* A',
  '** A1',
  '** A2',
  '*** A2a',
  '* B',
  'Always shown',
  '',
  '#+ATTR_REVEAL: :frag appear',
  '- one',
  '- two',
  '- three',
  '',
  '#+ATTR_REVEAL: :frag fade-in',
  'Closing line',
  '* C',
].join('\n');

describe('slideTree', () => {
  const doc = parseOutline(DECK);

  describe('nodeAt', () => {
    it('resolves nested paths', () => {
      expect(nodeAt(doc, [0, 1, 0])?.title).toBe('A2a');
      expect(nodeAt(doc, [2])?.title).toBe('C');
    });

    it('returns null for paths that do not resolve', () => {
      expect(nodeAt(doc, [])).toBeNull();
      expect(nodeAt(doc, [3])).toBeNull();
      expect(nodeAt(doc, [0, 2])).toBeNull();
      expect(nodeAt(doc, [0, -1])).toBeNull();
      expect(nodeAt(doc, [0.5])).toBeNull();
    });

    it('backs isValidPath', () => {
      expect(isValidPath(doc, [0, 1])).toBe(true);
      expect(isValidPath(doc, [1, 0])).toBe(false);
    });
  });

  describe('siblingsOf', () => {
    it('returns the parent children or the root sequence', () => {
      expect(siblingsOf(doc, [0, 1]).map((n) => n.title)).toEqual(['A1', 'A2']);
      expect(siblingsOf(doc, [2]).map((n) => n.title)).toEqual(['A', 'B', 'C']);
    });
  });

  describe('fragments', () => {
    it('counts one step per fragment list item and per other fragment block', () => {
      const b = nodeAt(doc, [1]);
      if (!b) throw new Error('missing slide B');

      expect(b.body.map(blockFragmentSteps)).toEqual([0, 3, 1]);
      expect(fragmentCount(b)).toBe(4);
    });

    it('is zero for a slide without fragments', () => {
      const a = nodeAt(doc, [0]);
      if (!a) throw new Error('missing slide A');

      expect(fragmentCount(a)).toBe(0);
    });
  });

  describe('paths', () => {
    it('follows last children to the deepest descendant', () => {
      expect(deepestLastPath(doc, [0])).toEqual([0, 1, 0]);
      expect(deepestLastPath(doc, [1])).toEqual([1]);
    });

    it('finds the last slide in preorder', () => {
      expect(lastPath(doc)).toEqual([2]);
    });
  });

  describe('preorder', () => {
    it('walks parents before children', () => {
      const visited: string[] = [];
      walkSlides(doc, (node, path) => visited.push(`${node.title}@${path.join('.')}`));

      expect(visited).toEqual(['A@0', 'A1@0.0', 'A2@0.1', 'A2a@0.1.0', 'B@1', 'C@2']);
    });

    it('counts slides and indexes them', () => {
      expect(countSlides(doc)).toBe(6);
      expect(preorderIndex(doc, [0])).toBe(0);
      expect(preorderIndex(doc, [0, 1, 0])).toBe(3);
      expect(preorderIndex(doc, [2])).toBe(5);
      expect(preorderIndex(doc, [9])).toBe(-1);
    });
  });

  describe('collectImagePaths', () => {
    it('lists each image once in order of first use', () => {
      const images = parseOutline('* A\n[[file:a.png]]\n* B\n[[b.svg]]\n[[file:a.png]]\n');

      expect(collectImagePaths(images)).toEqual(['a.png', 'b.svg']);
    });

    it('is empty when the deck has no images', () => {
      expect(collectImagePaths(doc)).toEqual([]);
    });
  });
});
