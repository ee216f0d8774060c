/**
 * @fileoverview Outline deck fetching, parsing and asset probing
 * @module initialization/deckLoader
 *
 * The deck is the only network dependency of a presentation:
 * - fetchDeckSource() downloads the outline text with retry and back-off
 * - probeAssets() checks every referenced image with a HEAD request
 * - loadDeck() does both and parses the outline in between
 *
 * Parse errors are not retried. A malformed deck is an authoring bug.
 */

import type { OutlineDocument } from '../core/documentModel';
import { collectImagePaths, countSlides } from '../core/slideTree';
import { parseOutline } from './outlineParser';

// ============================================================================
// CONSTANTS
// ============================================================================

const MAX_FETCH_ATTEMPTS = 3;
const RETRY_BACKOFF_MS = 1000; // Start at 1s for retries
const MAX_RETRY_BACKOFF_MS = 5000; // Cap at 5s

// ============================================================================
// ERROR CLASSES
// ============================================================================

/**
 * Error thrown when the deck cannot be downloaded after retries
 */
export class DeckFetchError extends Error {
  public readonly url: string;
  public readonly attempts: number;

  constructor(url: string, attempts: number, lastError: string) {
    super(
      `Failed to fetch slide deck after ${attempts} attempts: ${url}\n` +
      `Last error: ${lastError}`
    );
    this.name = 'DeckFetchError';
    this.url = url;
    this.attempts = attempts;
  }
}

// ============================================================================
// PUBLIC API
// ============================================================================

export interface LoadedDeck {
  document: OutlineDocument;
  // Absolute URL the deck was fetched from; images resolve against it
  baseUrl: string;
  // Image path -> reachable. Empty when probing is off.
  assets: Map<string, boolean>;
}

export interface LoadDeckOptions {
  probe?: boolean;
  // Defaults to the page location
  pageUrl?: string;
}

/**
 * Fetch, parse and probe a deck.
 *
 * @throws {DeckFetchError} If the deck cannot be downloaded
 * @throws {ParseError} If the outline is malformed
 */
export async function loadDeck(url: string, options: LoadDeckOptions = {}): Promise<LoadedDeck> {
  const { probe = true, pageUrl = window.location.href } = options;
  const baseUrl = new URL(url, pageUrl).href;

  console.log(`📚 Loading deck from ${baseUrl}...`);
  const source = await fetchDeckSource(baseUrl);

  const document = parseOutline(source);
  console.log(`✅ Parsed deck with ${countSlides(document)} slide(s)`);

  const assets = probe ? await probeAssets(document, baseUrl) : new Map<string, boolean>();

  return { document, baseUrl, assets };
}

/**
 * Download deck text with exponential back-off between attempts.
 *
 * @throws {DeckFetchError} If all attempts fail
 */
export async function fetchDeckSource(url: string): Promise<string> {
  let lastError = 'Unknown error';

  for (let attempt = 1; attempt <= MAX_FETCH_ATTEMPTS; attempt++) {
    try {
      console.log(`  📡 Attempt ${attempt}/${MAX_FETCH_ATTEMPTS} for ${url}...`);
      const response = await fetch(url);

      if (response.ok) {
        const text = await response.text();
        console.log(`  ✅ Fetched deck on attempt ${attempt}`);
        return text;
      }

      lastError = `HTTP ${response.status}: ${response.statusText}`;
    } catch (error) {
      lastError = error instanceof Error ? error.message : String(error);
    }

    if (attempt < MAX_FETCH_ATTEMPTS) {
      const delay = retryDelay(attempt);
      console.warn(`  ⚠️ ${lastError}, retrying in ${delay}ms...`);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw new DeckFetchError(url, MAX_FETCH_ATTEMPTS, lastError);
}

/**
 * HEAD-request every image the deck references.
 * Network failures count as missing; nothing here throws.
 */
export async function probeAssets(
  document: OutlineDocument,
  baseUrl: string
): Promise<Map<string, boolean>> {
  const paths = collectImagePaths(document);
  const availability = new Map<string, boolean>();
  if (paths.length === 0) return availability;

  console.log(`🔍 Probing ${paths.length} image asset(s)...`);

  const results = await Promise.allSettled(
    // async so an unparseable URL becomes a rejected probe rather than a throw
    paths.map(async (path) => fetch(new URL(path, baseUrl).href, { method: 'HEAD' }))
  );

  results.forEach((result, i) => {
    const path = paths[i];
    if (path === undefined) return;
    const ok = result.status === 'fulfilled' && result.value.ok;
    availability.set(path, ok);
    if (!ok) {
      console.warn(`🖼️ Image asset unreachable: ${path}`);
    }
  });

  return availability;
}

function retryDelay(attempt: number): number {
  return Math.min(RETRY_BACKOFF_MS * Math.pow(2, attempt - 1), MAX_RETRY_BACKOFF_MS);
}
