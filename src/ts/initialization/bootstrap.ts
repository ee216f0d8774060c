/**
 * @fileoverview Application bootstrap and environment initialization
 * @module initialization/bootstrap
 *
 * Entry point for a page that hosts a deck:
 *
 *   <div id="deck-container" data-deck-src="talk.org"></div>
 *   <script type="text/yaml" id="deck-config">rendering: { showNotes: true }</script>
 *
 * Responsibilities:
 * - Wait for DOM readiness
 * - Read presenter config
 * - Build the slide surface and error display
 * - Hand off to presentationOrchestrator.ts and report anything it throws
 */

import { loadPresenterConfig } from "./configLoader";
import { DeckFetchError } from "./deckLoader";
import { ParseError } from "./outlineParser";
import {
  presentationOrchestrator,
  type RunningPresentation,
} from "./presentationOrchestrator";
import { ErrorDisplay } from "../ui/errorDisplay";
import { SlideSurface } from "../ui/slideSurface";

/**
 * Attribute naming the deck URL on the container element
 */
export const DECK_SOURCE_ATTRIBUTE = "data-deck-src";

/**
 * Start a presentation in the given container.
 *
 * Never rejects: failures are shown in the container (or as a floating
 * error if the surface could not be built) and the promise resolves to null.
 */
export async function bootstrapPresentation(
  container: HTMLElement
): Promise<RunningPresentation | null> {
  console.log("🚀 Starting presentation bootstrap...");

  const deckUrl = container.getAttribute(DECK_SOURCE_ATTRIBUTE);
  if (!container.id || !deckUrl) {
    console.error(`💥 Deck container needs an id and a ${DECK_SOURCE_ATTRIBUTE} attribute`);
    new ErrorDisplay().showSystemError(
      "bootstrap-init",
      "Deck container is misconfigured",
      `Expected an id and ${DECK_SOURCE_ATTRIBUTE} on the container element`
    );
    return null;
  }

  let errorDisplay = new ErrorDisplay();

  try {
    const config = loadPresenterConfig();

    const surface = new SlideSurface(container.id, {
      showNotes: config.rendering.showNotes,
      placeholderText: config.rendering.placeholderText,
    });
    errorDisplay = new ErrorDisplay(surface);
    console.log("✅ UI components initialized");

    return await presentationOrchestrator({ deckUrl, config, surface, errorDisplay });
  } catch (error) {
    console.error("💥 Presentation failed to start:", error);
    showBootstrapError(errorDisplay, error);
    return null;
  }
}

/**
 * Route a startup failure to the matching error view.
 */
function showBootstrapError(errorDisplay: ErrorDisplay, error: unknown): void {
  if (error instanceof ParseError) {
    errorDisplay.showParseError(error);
    return;
  }

  if (error instanceof DeckFetchError) {
    errorDisplay.showNetworkError("deck-fetch", error.url);
    return;
  }

  errorDisplay.showSystemError(
    "bootstrap-init",
    "Presentation initialization failed",
    error instanceof Error ? error.message : "Unknown error occurred"
  );
}

/**
 * Bootstrap entry point - runs when the DOM is ready, and only on pages
 * that declare a deck container.
 */
function initializeWhenReady(): void {
  const container = document.querySelector<HTMLElement>(`[${DECK_SOURCE_ATTRIBUTE}]`);
  if (!container) {
    return;
  }

  void bootstrapPresentation(container);
}

// Check if DOM is already ready
if (document.readyState === "loading") {
  document.addEventListener("DOMContentLoaded", initializeWhenReady);
} else {
  initializeWhenReady();
}
