// src/ts/initialization/deckLoader.test.ts
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DeckFetchError, fetchDeckSource, loadDeck, probeAssets } from './deckLoader';
import { ParseError, parseOutline } from './outlineParser';

function ok(body = '') {
  return { ok: true, status: 200, statusText: 'OK', text: () => Promise.resolve(body) };
}

function failed(status: number, statusText: string) {
  return { ok: false, status, statusText, text: () => Promise.resolve('') };
}

describe('deckLoader', () => {
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('fetchDeckSource', () => {
    it('returns the text of a successful response', async () => {
      fetchMock.mockResolvedValue(ok('* A\n'));

      await expect(fetchDeckSource('https://example.com/talk.org')).resolves.toBe('* A\n');
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock).toHaveBeenCalledWith('https://example.com/talk.org');
    });

    it('retries with growing back-off until a fetch succeeds', async () => {
      fetchMock
        .mockResolvedValueOnce(failed(503, 'Service Unavailable'))
        .mockRejectedValueOnce(new Error('offline'))
        .mockResolvedValueOnce(ok('* A\n'));

      const promise = fetchDeckSource('https://example.com/talk.org');
      await vi.runAllTimersAsync();

      await expect(promise).resolves.toBe('* A\n');
      expect(fetchMock).toHaveBeenCalledTimes(3);

      const warnings = vi.mocked(console.warn).mock.calls.map((call) => call[0]);
      expect(warnings).toEqual([
        '  ⚠️ HTTP 503: Service Unavailable, retrying in 1000ms...',
        '  ⚠️ offline, retrying in 2000ms...',
      ]);
    });

    it('gives up after three attempts', async () => {
      fetchMock.mockResolvedValue(failed(404, 'Not Found'));

      const promise = fetchDeckSource('https://example.com/talk.org');
      const assertion = expect(promise).rejects.toThrow(
        'Failed to fetch slide deck after 3 attempts: https://example.com/talk.org\nLast error: HTTP 404: Not Found'
      );
      await vi.runAllTimersAsync();

      await assertion;
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it('reports the last network error', async () => {
      fetchMock.mockRejectedValue(new Error('offline'));

      const promise = fetchDeckSource('https://example.com/talk.org');
      const assertion = expect(promise).rejects.toBeInstanceOf(DeckFetchError);
      await vi.runAllTimersAsync();

      await assertion;
      await expect(promise).rejects.toMatchObject({ attempts: 3, url: 'https://example.com/talk.org' });
    });
  });

  describe('probeAssets', () => {
    it('marks each image reachable or not', async () => {
      fetchMock.mockImplementation((url: string) => {
        if (url.endsWith('a.png')) return Promise.resolve(ok());
        if (url.endsWith('gone.png')) return Promise.resolve(failed(404, 'Not Found'));
        return Promise.reject(new Error('offline'));
      });
      const doc = parseOutline('* A\n[[file:img/a.png]]\n[[file:img/gone.png]]\n* B\n[[file:img/err.png]]\n');

      const availability = await probeAssets(doc, 'https://example.com/decks/talk.org');

      expect([...availability]).toEqual([
        ['img/a.png', true],
        ['img/gone.png', false],
        ['img/err.png', false],
      ]);
      expect(fetchMock).toHaveBeenCalledWith('https://example.com/decks/img/a.png', { method: 'HEAD' });
    });

    it('marks a path that is not a valid URL as unreachable', async () => {
      const doc = parseOutline('* Logo\n[[https://my site.com/logo.png]]\n');

      const availability = await probeAssets(doc, 'https://example.com/talk.org');

      expect([...availability]).toEqual([['https://my site.com/logo.png', false]]);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('skips the network when there are no images', async () => {
      const availability = await probeAssets(parseOutline('* A\n'), 'https://example.com/talk.org');

      expect(availability.size).toBe(0);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('loadDeck', () => {
    it('fetches, parses and probes relative to the page', async () => {
      fetchMock.mockResolvedValueOnce(ok('#+TITLE: Demo\n* A\n[[file:img/a.png]]\n')).mockResolvedValueOnce(ok());

      const deck = await loadDeck('talk.org', { pageUrl: 'https://example.com/decks/index.html' });

      expect(deck.baseUrl).toBe('https://example.com/decks/talk.org');
      expect(deck.document.title).toBe('Demo');
      expect([...deck.assets]).toEqual([['img/a.png', true]]);
      expect(fetchMock).toHaveBeenNthCalledWith(1, 'https://example.com/decks/talk.org');
    });

    it('skips probing when disabled', async () => {
      fetchMock.mockResolvedValue(ok('* A\n[[file:img/a.png]]\n'));

      const deck = await loadDeck('https://example.com/talk.org', { probe: false });

      expect(deck.assets.size).toBe(0);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('does not retry a malformed deck', async () => {
      fetchMock.mockResolvedValue(ok('** too deep\n'));

      await expect(loadDeck('https://example.com/talk.org')).rejects.toBeInstanceOf(ParseError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });
});
