/**
 * @fileoverview Navigation cursor, controller and navigation message schemas
 * @module core/navigationSchema
 *
 * Tracks the presenter's position in the slide tree: a path of child
 * indices plus the number of fragments revealed on that slide.
 *
 * CLONING STRATEGY:
 * - Constructor: validates and clones the starting cursor
 * - getCursor(): returns a clone so callers cannot move the cursor
 * - All mutations go through advance(), retreat() and jumpTo()
 *
 * Input events never call the controller directly. They are turned into
 * NavigationMessages, validated, then applied by NavigationMessageHandler.
 */

import { z } from "zod";
import {
  CursorSchema,
  SlidePathSchema,
  pathsEqual,
  type Cursor,
  type NavigationResult,
  type SlidePath,
} from "./coreTypes";
import type { OutlineDocument, SlideNode } from "./documentModel";
import {
  countSlides,
  deepestLastPath,
  fragmentCount,
  lastPath,
  nodeAt,
  preorderIndex,
  siblingsOf,
} from "./slideTree";

// ============================================================================
// ERRORS
// ============================================================================

/**
 * Error thrown when a jump targets a slide that does not exist.
 * The cursor is left where it was.
 */
export class InvalidPathError extends Error {
  public readonly path: unknown;

  constructor(path: unknown, detail?: string) {
    super(
      `Invalid slide path: ${JSON.stringify(path)}` + (detail ? ` (${detail})` : "")
    );
    this.name = "InvalidPathError";
    this.path = path;
  }
}

// ============================================================================
// CONTROLLER
// ============================================================================

/**
 * Default cursor: first slide, nothing revealed
 */
export function getDefaultCursor(): Cursor {
  return { path: [0], fragmentIndex: 0 };
}

/**
 * Owns the single cursor into a loaded document.
 */
export class NavigationController {
  private cursor: Cursor;

  constructor(
    private readonly document: OutlineDocument,
    initial: Cursor = getDefaultCursor()
  ) {
    const parsed = CursorSchema.parse(initial);
    const node = nodeAt(document, parsed.path);
    if (!node) {
      throw new InvalidPathError(parsed.path, "starting cursor does not resolve");
    }
    if (parsed.fragmentIndex > fragmentCount(node)) {
      throw new Error(
        `Invalid cursor: fragment ${parsed.fragmentIndex} exceeds ${fragmentCount(node)} fragments at ${JSON.stringify(parsed.path)}`
      );
    }
    this.cursor = { path: [...parsed.path], fragmentIndex: parsed.fragmentIndex };
  }

  getCursor(): Cursor {
    return { path: [...this.cursor.path], fragmentIndex: this.cursor.fragmentIndex };
  }

  getCurrentNode(): SlideNode {
    return this.nodeAtCursor();
  }

  /**
   * Reveal the next fragment, else enter the first child, else move to the
   * next sibling (ascending as needed). No-op at the end of the deck.
   */
  advance(): NavigationResult {
    const node = this.nodeAtCursor();

    if (this.cursor.fragmentIndex < fragmentCount(node)) {
      this.cursor.fragmentIndex++;
      return this.moved();
    }

    if (node.children.length > 0) {
      this.setCursor([...this.cursor.path, 0], 0);
      return this.moved();
    }

    let path = this.cursor.path;
    while (path.length > 0) {
      const index = path[path.length - 1];
      if (index + 1 < siblingsOf(this.document, path).length) {
        this.setCursor([...path.slice(0, -1), index + 1], 0);
        return this.moved();
      }
      path = path.slice(0, -1);
    }

    return { status: "boundary", boundary: "end", cursor: this.getCursor() };
  }

  /**
   * Hide the last fragment, else step back to the previous slide in
   * preorder with all of its fragments revealed. No-op at the start.
   */
  retreat(): NavigationResult {
    if (this.cursor.fragmentIndex > 0) {
      this.cursor.fragmentIndex--;
      return this.moved();
    }

    const path = this.cursor.path;
    const index = path[path.length - 1];

    if (index > 0) {
      const previous = deepestLastPath(this.document, [...path.slice(0, -1), index - 1]);
      this.setCursor(previous, this.fullyRevealed(previous));
      return this.moved();
    }

    if (path.length > 1) {
      const parent = path.slice(0, -1);
      this.setCursor(parent, this.fullyRevealed(parent));
      return this.moved();
    }

    return { status: "boundary", boundary: "start", cursor: this.getCursor() };
  }

  /**
   * Move to a slide with nothing revealed.
   *
   * @throws {InvalidPathError} If the path is malformed or does not resolve;
   *   the cursor is unchanged
   */
  jumpTo(path: unknown): NavigationResult {
    const parsed = SlidePathSchema.safeParse(path);
    if (!parsed.success) {
      throw new InvalidPathError(path, "not a list of slide indices");
    }
    if (!nodeAt(this.document, parsed.data)) {
      throw new InvalidPathError(parsed.data, "no slide at this path");
    }

    this.setCursor(parsed.data, 0);
    return this.moved();
  }

  isAtStart(): boolean {
    return this.cursor.fragmentIndex === 0 && pathsEqual(this.cursor.path, [0]);
  }

  isAtEnd(): boolean {
    const last = lastPath(this.document);
    return (
      pathsEqual(this.cursor.path, last) &&
      this.cursor.fragmentIndex === this.fullyRevealed(last)
    );
  }

  /**
   * 1-based preorder position of the current slide and the slide total.
   */
  position(): { index: number; total: number } {
    return {
      index: preorderIndex(this.document, this.cursor.path) + 1,
      total: countSlides(this.document),
    };
  }

  private nodeAtCursor(): SlideNode {
    const node = nodeAt(this.document, this.cursor.path);
    if (!node) {
      throw new Error(
        `Invalid navigation state: ${JSON.stringify(this.cursor.path)} does not resolve`
      );
    }
    return node;
  }

  private fullyRevealed(path: SlidePath): number {
    const node = nodeAt(this.document, path);
    return node ? fragmentCount(node) : 0;
  }

  private setCursor(path: SlidePath, fragmentIndex: number): void {
    this.cursor = { path: [...path], fragmentIndex };
  }

  private moved(): NavigationResult {
    return { status: "moved", cursor: this.getCursor() };
  }
}

// ============================================================================
// MESSAGES
// ============================================================================

/**
 * Schema for navigation commands coming from input events
 * (keyboard, buttons, links, URL hash).
 */
export const NavigationMessageSchema = z.discriminatedUnion("method", [
  z.object({ method: z.literal("advance") }),
  z.object({ method: z.literal("retreat") }),
  z.object({ method: z.literal("jumpTo"), args: z.tuple([SlidePathSchema]) }),
]);

export type NavigationMessage = z.infer<typeof NavigationMessageSchema>;

/**
 * Validates navigation messages and applies them to a controller.
 */
export class NavigationMessageHandler {
  constructor(private navigationController: NavigationController) {}

  // Throws on malformed messages; jumpTo keeps its own InvalidPathError
  validateMessage(message: unknown): NavigationMessage {
    if (
      typeof message === "object" &&
      message !== null &&
      "method" in message &&
      message.method === "jumpTo"
    ) {
      const args = "args" in message ? message.args : undefined;
      const path = Array.isArray(args) ? args[0] : undefined;
      if (!SlidePathSchema.safeParse(path).success) {
        throw new InvalidPathError(path, "not a list of slide indices");
      }
    }

    const result = NavigationMessageSchema.safeParse(message);
    if (!result.success) {
      throw new Error(`Invalid navigation message: ${result.error.message}`);
    }
    return result.data;
  }

  handleMessage(message: unknown): NavigationResult {
    const validated = this.validateMessage(message);

    switch (validated.method) {
      case "advance":
        return this.navigationController.advance();
      case "retreat":
        return this.navigationController.retreat();
      case "jumpTo":
        return this.navigationController.jumpTo(validated.args[0]);
    }
  }
}
