/**
 * @fileoverview Presentation orchestrator - loads the deck and wires the live presentation
 * @module initialization/presentationOrchestrator
 *
 * Called by bootstrap.ts once config is read and the surface exists.
 *
 * Execution flow:
 * 1. Fetch, parse and probe the deck (the only async phase)
 * 2. Build renderer and Presentation around the existing surface
 * 3. Route buttons, links, keyboard and URL hash into Presentation.dispatch
 * 4. Draw the first frame, starting from the hash when it names a slide
 *
 * After this resolves the presentation is driven entirely by input events.
 */

import { hashToPath, pathToHash, pathsEqual } from '../core/coreTypes';
import type { NavigationMessage } from '../core/navigationSchema';
import { Presentation } from '../core/presentation';
import type { PresenterConfig } from '../core/settingsSchema';
import { attachKeyboardControls } from '../navigation/keyboardControls';
import type { ErrorDisplay } from '../ui/errorDisplay';
import { FrameRenderer, createProbedAssetResolver } from '../ui/frameRenderer';
import type { SlideSurface } from '../ui/slideSurface';
import { loadDeck } from './deckLoader';

export interface OrchestratorParams {
  deckUrl: string;
  config: PresenterConfig;
  surface: SlideSurface;
  errorDisplay: ErrorDisplay;
}

export interface RunningPresentation {
  presentation: Presentation;
  // Removes keyboard and hash listeners
  stop(): void;
}

/**
 * Load the deck and start presenting.
 *
 * @throws {DeckFetchError} If the deck cannot be downloaded
 * @throws {ParseError} If the deck is malformed
 */
export async function presentationOrchestrator(params: OrchestratorParams): Promise<RunningPresentation> {
  const { deckUrl, config, surface, errorDisplay } = params;
  console.log('🎯 Starting presentation orchestration...');

  // Phase 1: deck
  const deck = await loadDeck(deckUrl, { probe: config.assets.probe });

  // Phase 2: presentation
  const renderer = new FrameRenderer({
    resolveAsset: createProbedAssetResolver(deck.baseUrl, deck.assets),
    highlight: config.rendering.highlight,
    languageAliases: config.rendering.languageAliases,
    placeholderText: config.rendering.placeholderText,
  });
  const presentation = new Presentation(deck.document, renderer, surface, errorDisplay);

  // Phase 3: inputs
  const syncHash = (): void => {
    if (!config.syncHash) return;
    const hash = pathToHash(presentation.getCursor().path);
    if (window.location.hash !== hash) {
      window.history.replaceState(null, '', hash);
    }
  };

  const navigate = (message: NavigationMessage): void => {
    const result = presentation.dispatch(message);
    if (result !== null && result.status === 'moved') {
      syncHash();
    }
  };

  surface.setDeckTitle(deck.document.title);
  surface.connect(navigate, deck.document.anchors);
  const detachKeyboard = attachKeyboardControls(document, config.keymap, navigate);

  const onHashChange = (): void => {
    const path = hashToPath(window.location.hash);
    if (path !== null && !pathsEqual(path, presentation.getCursor().path)) {
      navigate({ method: 'jumpTo', args: [path] });
    }
  };
  if (config.syncHash) {
    window.addEventListener('hashchange', onHashChange);
  }

  // Phase 4: first frame
  presentation.start(config.syncHash ? hashToPath(window.location.hash) : null);
  syncHash();

  console.log('✅ Presentation running');

  return {
    presentation,
    stop: () => {
      detachKeyboard();
      window.removeEventListener('hashchange', onHashChange);
    },
  };
}
