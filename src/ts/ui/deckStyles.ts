/**
 * @fileoverview Deck style system
 * @module ui/deckStyles
 *
 * Centralized Tailwind class definitions for the slide surface.
 *
 * Usage:
 *   import { DeckStyles } from '../ui/deckStyles';
 *   heading.className = DeckStyles.typography.slideTitle;
 */

export const DeckStyles = {
  // ==========================================================================
  // TYPOGRAPHY
  // ==========================================================================

  typography: {
    /** Deck title in the header bar */
    deckTitle: "text-sm font-semibold text-gray-600 dark:text-amber-100 truncate",

    /** Top-level slide title */
    slideTitle: "text-4xl font-bold text-gray-900 dark:text-amber-50 mb-8",

    /** Vertical (nested) slide title */
    subSlideTitle: "text-3xl font-semibold text-gray-900 dark:text-amber-50 mb-6",

    /** Paragraph text */
    body: "text-xl text-gray-800 dark:text-amber-100",

    /** Inline code and verbatim spans */
    inlineCode: "font-mono text-base bg-amber-100 dark:bg-amber-900/40 px-1 rounded",

    /** Links */
    link: "text-green-700 dark:text-green-400 underline hover:opacity-80",

    /** Image captions */
    caption: "text-sm text-gray-600 dark:text-amber-200 mt-2 text-center",
  },

  // ==========================================================================
  // CONTAINERS
  // ==========================================================================

  containers: {
    /** Whole presentation viewport */
    deck: "min-h-screen flex flex-col bg-amber-50 dark:bg-stone-900",

    /** Slide card */
    slide: "flex-1 max-w-5xl w-full mx-auto p-12 space-y-6",

    /** Speaker notes drawer */
    notes: "max-w-5xl w-full mx-auto p-4 text-sm text-gray-700 dark:text-amber-200 bg-amber-50 dark:bg-amber-900/20 rounded-lg whitespace-pre-line",

    /** Header bar */
    header: "flex items-center justify-between px-6 py-3",
  },

  // ==========================================================================
  // CONTENT BLOCKS
  // ==========================================================================

  blocks: {
    list: "list-disc pl-8 space-y-2 text-xl text-gray-800 dark:text-amber-100",
    orderedList: "list-decimal pl-8 space-y-2 text-xl text-gray-800 dark:text-amber-100",
    quote: "border-l-4 border-amber-600 pl-6 italic text-2xl text-gray-800 dark:text-amber-100 whitespace-pre-line",
    attribution: "block not-italic text-base text-gray-600 dark:text-amber-200 mt-3",
    code: "hljs font-mono text-base rounded-lg p-4 overflow-x-auto bg-gray-900 text-gray-100",
    image: "max-h-[60vh] mx-auto rounded-lg shadow-md",
    imagePlaceholder: "flex items-center justify-center h-48 rounded-lg border-2 border-dashed border-gray-400 text-gray-500",
    linkBlock: "text-xl",
  },

  // ==========================================================================
  // NAVIGATION CONTROLS
  // ==========================================================================

  controls: {
    bar: "flex items-center justify-end gap-3 px-6 py-3",
    button: "px-4 py-2 bg-green-600 dark:bg-green-500 text-white rounded hover:opacity-90 transition-opacity disabled:opacity-40 disabled:cursor-not-allowed",
    counter: "text-sm text-gray-600 dark:text-amber-200",
  },

  // ==========================================================================
  // PROGRESS
  // ==========================================================================

  progress: {
    barContainer: "w-full bg-gray-200 dark:bg-gray-700 h-1",
    barFill: "bg-green-600 dark:bg-green-500 h-1 transition-all duration-300",
  },
} as const;

/**
 * Class applied to a revealed fragment, e.g. "fragment fragment-fade-in"
 */
export function fragmentClass(style: string): string {
  return `fragment fragment-${style}`;
}
