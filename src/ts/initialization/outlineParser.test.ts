// src/ts/initialization/outlineParser.test.ts
import { describe, it, expect } from 'vitest';
import { ParseError, parseOutline } from './outlineParser';

function parseError(source: string): ParseError {
  try {
    parseOutline(source);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error('Expected parseOutline to throw');
}

describe('parseOutline', () => {
  describe('heading nesting', () => {
    it('nests headings by star count', () => {
      const doc = parseOutline('* A\n** B\n*** C\n');

      expect(doc.slides).toHaveLength(1);
      const a = doc.slides[0];
      const b = a.children[0];
      const c = b.children[0];

      expect([a.title, b.title, c.title]).toEqual(['A', 'B', 'C']);
      expect([a.depth, b.depth, c.depth]).toEqual([0, 1, 2]);
      expect(c.children).toEqual([]);
    });

    it('records the 1-based heading line', () => {
      const doc = parseOutline('* A\n\n** B\n');

      expect(doc.slides[0].line).toBe(1);
      expect(doc.slides[0].children[0].line).toBe(3);
    });

    it('closes deeper headings when a shallower one starts', () => {
      const doc = parseOutline('* A\n** A1\n** A2\n* B\n** B1\n');

      expect(doc.slides.map((s) => s.title)).toEqual(['A', 'B']);
      expect(doc.slides[0].children.map((s) => s.title)).toEqual(['A1', 'A2']);
      expect(doc.slides[1].children.map((s) => s.title)).toEqual(['B1']);
    });

    it('accepts CRLF line endings and a byte order mark', () => {
      const doc = parseOutline('\uFEFF* A\r\n** B\r\n');

      expect(doc.slides[0].title).toBe('A');
      expect(doc.slides[0].children[0].title).toBe('B');
    });

    it('splits trailing tags from the title', () => {
      const doc = parseOutline('* Code :demo:live:\n');

      expect(doc.slides[0].title).toBe('Code');
      expect(doc.slides[0].tags).toEqual(['demo', 'live']);
    });

    it('drops noexport subtrees', () => {
      const doc = parseOutline('* Keep\n* Drop :noexport:\n** Hidden child\nhidden text\n* Also keep\n');

      expect(doc.slides.map((s) => s.title)).toEqual(['Keep', 'Also keep']);
      expect(doc.slides[0].children).toEqual([]);
    });

    it('skips source blocks whole inside a noexport subtree', () => {
      const doc = parseOutline('* A :noexport:\n#+BEGIN_SRC org\n* inner\n#+END_SRC\n* B\n');

      expect(doc.slides.map((s) => s.title)).toEqual(['B']);
    });
  });

  describe('preamble', () => {
    it('collects keywords before the first heading', () => {
      const doc = parseOutline('#+TITLE: Test Deck\n#+AUTHOR: Test Author\n#+THEME: plain\n\n* A\n');

      expect(doc.title).toBe('Test Deck');
      expect(doc.author).toBe('Test Author');
      expect(doc.keywords).toEqual({ TITLE: 'Test Deck', AUTHOR: 'Test Author', THEME: 'plain' });
    });

    it('ignores document keywords inside slides', () => {
      const doc = parseOutline('* A\n#+TITLE: Too late\n');

      expect(doc.title).toBeNull();
      expect(doc.keywords).toEqual({});
    });

    it('skips comment lines', () => {
      const doc = parseOutline('# leading comment\n* A\n# inside\nText\n');

      expect(doc.slides[0].body).toEqual([{ kind: 'paragraph', text: 'Text', fragment: null }]);
    });
  });

  describe('property drawers', () => {
    it('reads properties and registers CUSTOM_ID anchors', () => {
      const doc = parseOutline('* Intro\n  :PROPERTIES:\n  :CUSTOM_ID: intro\n  :END:\nHello\n* Next\n');

      expect(doc.slides[0].properties).toEqual({ CUSTOM_ID: 'intro' });
      expect(doc.slides[0].body).toEqual([{ kind: 'paragraph', text: 'Hello', fragment: null }]);
      expect(doc.anchors).toEqual({ '#intro': [0], '*Intro': [0], '*Next': [1] });
    });

    it('rejects duplicate CUSTOM_ID values', () => {
      const error = parseError(
        '* A\n:PROPERTIES:\n:CUSTOM_ID: same\n:END:\n* B\n:PROPERTIES:\n:CUSTOM_ID: same\n:END:\n'
      );

      expect(error.reason).toBe('duplicate CUSTOM_ID "same"');
      expect(error.line).toBe(5);
    });
  });

  describe('paragraphs and lists', () => {
    it('joins paragraph lines and splits on blank lines', () => {
      const doc = parseOutline('* A\nWelcome to the /deck/.\n  Second line.\n\nAnother.\n');

      expect(doc.slides[0].body).toEqual([
        { kind: 'paragraph', text: 'Welcome to the /deck/. Second line.', fragment: null },
        { kind: 'paragraph', text: 'Another.', fragment: null },
      ]);
    });

    it('nests list items by indentation', () => {
      const doc = parseOutline('* A\n- one\n- two\n  - nested\n- three\n');

      expect(doc.slides[0].body).toEqual([
        {
          kind: 'list',
          ordered: false,
          items: [
            { text: 'one', children: [] },
            { text: 'two', children: [{ text: 'nested', children: [] }] },
            { text: 'three', children: [] },
          ],
          fragment: null,
        },
      ]);
    });

    it('detects ordered lists', () => {
      const doc = parseOutline('* A\n1. first\n2) second\n');
      const block = doc.slides[0].body[0];

      expect(block.kind).toBe('list');
      if (block.kind !== 'list') return;
      expect(block.ordered).toBe(true);
      expect(block.items.map((item) => item.text)).toEqual(['first', 'second']);
    });

    it('continues an item on a more indented line', () => {
      const doc = parseOutline('* A\n- item one\n  continues here\n- item two\n');
      const block = doc.slides[0].body[0];

      if (block.kind !== 'list') throw new Error('expected list');
      expect(block.items.map((item) => item.text)).toEqual(['item one continues here', 'item two']);
    });

    it('ends a list at an unindented paragraph line', () => {
      const doc = parseOutline('* A\n- item\nafter\n');

      expect(doc.slides[0].body.map((b) => b.kind)).toEqual(['list', 'paragraph']);
    });
  });

  describe('delimited blocks', () => {
    it('reads source blocks verbatim with their language', () => {
      const doc = parseOutline('* A\n#+BEGIN_SRC python\n,* not a heading\nprint("hi")\n#+END_SRC\n');

      expect(doc.slides[0].body).toEqual([
        { kind: 'code', language: 'python', text: '* not a heading\nprint("hi")', fragment: null },
      ]);
      expect(doc.slides[0].children).toEqual([]);
    });

    it('treats example blocks as code without a language', () => {
      const doc = parseOutline('* A\n#+begin_example\n  indented\n#+end_example\n');

      expect(doc.slides[0].body).toEqual([
        { kind: 'code', language: null, text: '  indented', fragment: null },
      ]);
    });

    it('splits a trailing attribution from a quote', () => {
      const doc = parseOutline('* A\n#+BEGIN_QUOTE\nKeep it simple.\n-- Someone\n#+END_QUOTE\n');

      expect(doc.slides[0].body).toEqual([
        { kind: 'quote', text: 'Keep it simple.', attribution: 'Someone', fragment: null },
      ]);
    });

    it('collects speaker notes apart from the body', () => {
      const doc = parseOutline('* A\nBody\n#+BEGIN_NOTES\nSay hello.\n#+END_NOTES\n#+BEGIN_NOTES\nThen wave.\n#+END_NOTES\n');

      expect(doc.slides[0].body).toEqual([{ kind: 'paragraph', text: 'Body', fragment: null }]);
      expect(doc.slides[0].notes).toBe('Say hello.\n\nThen wave.');
    });

    it('passes through unknown wrapper blocks', () => {
      const doc = parseOutline('* A\n#+BEGIN_CENTER\nCentered text\n#+END_CENTER\n');

      expect(doc.slides[0].body).toEqual([{ kind: 'paragraph', text: 'Centered text', fragment: null }]);
    });
  });

  describe('fragments', () => {
    it('marks the next block as a fragment', () => {
      const doc = parseOutline('* A\n#+ATTR_REVEAL: :frag (appear fade-in)\n- a\n- b\n- c\n');
      const block = doc.slides[0].body[0];

      expect(block.fragment).toEqual({ styles: ['appear', 'fade-in'] });
    });

    it('applies a single style', () => {
      const doc = parseOutline('* A\n#+ATTR_REVEAL: :frag roll-in\nRevealed\n');

      expect(doc.slides[0].body[0].fragment).toEqual({ styles: ['roll-in'] });
    });

    it('treats :frag none as no fragment', () => {
      const doc = parseOutline('* A\n#+ATTR_REVEAL: :frag none\nShown\n');

      expect(doc.slides[0].body[0].fragment).toBeNull();
    });

    it('consumes the marker with the first following block', () => {
      const doc = parseOutline('* A\n#+ATTR_REVEAL: :frag appear\nFirst\n\nSecond\n');

      expect(doc.slides[0].body.map((b) => b.fragment)).toEqual([{ styles: ['appear'] }, null]);
    });
  });

  describe('images and links', () => {
    it('turns a standalone file link into a captioned image', () => {
      const doc = parseOutline('* Pic\n#+CAPTION: A diagram\n[[file:img/diagram.png]]\n');

      expect(doc.slides[0].body).toEqual([
        { kind: 'image', path: 'img/diagram.png', caption: 'A diagram', fragment: null },
      ]);
    });

    it('drops a caption that precedes some other block', () => {
      const doc = parseOutline('* S\n#+CAPTION: Fig 1\nSome text.\n\n[[pic.png]]\n');

      expect(doc.slides[0].body).toEqual([
        { kind: 'paragraph', text: 'Some text.', fragment: null },
        { kind: 'image', path: 'pic.png', caption: null, fragment: null },
      ]);
    });

    it('resolves internal link blocks to slide paths', () => {
      const doc = parseOutline(
        '* One\n:PROPERTIES:\n:CUSTOM_ID: one\n:END:\n* Two\n[[#one][Back to one]]\n'
      );

      expect(doc.slides[1].body).toEqual([
        { kind: 'link', url: '#one', label: 'Back to one', target: [0], fragment: null },
      ]);
    });

    it('leaves external link blocks unresolved', () => {
      const doc = parseOutline('* A\n[[https://example.com][Site]]\n');

      expect(doc.slides[0].body).toEqual([
        { kind: 'link', url: 'https://example.com', label: 'Site', target: null, fragment: null },
      ]);
    });

    it('resolves heading-title links inside paragraphs', () => {
      const doc = parseOutline('* One\nSee [[*Two]] next.\n* Two\n');

      expect(doc.anchors['*Two']).toEqual([1]);
      expect(doc.slides[0].body).toEqual([
        { kind: 'paragraph', text: 'See [[*Two]] next.', fragment: null },
      ]);
    });
  });

  describe('errors', () => {
    it('rejects a first heading deeper than one star', () => {
      const error = parseError('** A\n');

      expect(error.reason).toBe('first heading must be at depth 0 (one star), found depth 1');
      expect(error.line).toBe(1);
      expect(error.region).toBe('** A');
    });

    it('rejects a heading that skips a level', () => {
      const error = parseError('* A\n*** C\n');

      expect(error.message).toBe('Parse error at line 2: heading at depth 2 has no parent at depth 1\n  *** C');
    });

    it('rejects an unterminated block', () => {
      const error = parseError('* A\n#+BEGIN_SRC js\nconst x = 1;\n');

      expect(error.reason).toBe('unterminated #+BEGIN_SRC block');
      expect(error.line).toBe(2);
    });

    it('rejects a stray block end', () => {
      const error = parseError('* A\n#+END_QUOTE\n');

      expect(error.reason).toBe('#+END_QUOTE without a matching #+BEGIN_QUOTE');
      expect(error.line).toBe(2);
    });

    it('rejects an unterminated property drawer', () => {
      const error = parseError('* A\n:PROPERTIES:\n:CUSTOM_ID: a\n');

      expect(error.reason).toBe('unterminated :PROPERTIES: drawer');
      expect(error.line).toBe(2);
    });

    it('rejects content before the first heading', () => {
      const error = parseError('Hello\n* A\n');

      expect(error.reason).toBe('content before the first heading');
      expect(error.line).toBe(1);
      expect(error.region).toBe('Hello');
    });

    it('rejects an unresolvable internal link', () => {
      const error = parseError('* A\n\n[[#missing][Nowhere]]\n');

      expect(error.reason).toBe('unresolvable link reference "#missing"');
      expect(error.line).toBe(3);
      expect(error.region).toBe('[[#missing][Nowhere]]');
    });

    it('rejects a document without slides', () => {
      expect(parseError('').reason).toBe('document contains no slides');
      expect(parseError('#+TITLE: Empty\n').reason).toBe('document contains no slides');
    });

    it('omits the region line when there is none', () => {
      expect(parseError('').message).toBe('Parse error at line 1: document contains no slides');
    });
  });
});
