/**
 * @fileoverview Presentation core - ties document, cursor and renderer together
 * @module core/presentation
 *
 * Control flow on every input event:
 * 1. dispatch(message) validates the message and moves the cursor
 * 2. The node at the cursor is rendered into a VisualFrame
 * 3. The surface draws the frame
 *
 * No DOM access here; surfaces and error reporting are injected.
 */

import type { Cursor, NavigationResult, SlidePath } from "./coreTypes";
import type { OutlineDocument } from "./documentModel";
import {
  InvalidPathError,
  NavigationController,
  NavigationMessageHandler,
} from "./navigationSchema";
import type { FrameRenderer, VisualFrame } from "../ui/frameRenderer";

export interface NavigationStatus {
  cursor: Cursor;
  atStart: boolean;
  atEnd: boolean;
  position: { index: number; total: number };
}

/**
 * Anything that can draw frames (DOM surface, test double)
 */
export interface PresentationSurface {
  draw(frame: VisualFrame, status: NavigationStatus): void;
}

export interface NavigationErrorReporter {
  showNavigationNotice(error: InvalidPathError): void;
}

export class Presentation {
  private readonly controller: NavigationController;
  private readonly messageHandler: NavigationMessageHandler;
  // Paths whose missing assets were already logged
  private readonly reportedMissingAssets = new Set<string>();

  constructor(
    readonly document: OutlineDocument,
    private readonly renderer: FrameRenderer,
    private readonly surface: PresentationSurface,
    private readonly errorReporter: NavigationErrorReporter | null = null
  ) {
    this.controller = new NavigationController(document);
    this.messageHandler = new NavigationMessageHandler(this.controller);
  }

  /**
   * Draw the first frame, optionally starting from a given slide.
   * An unknown starting path falls back to the first slide.
   */
  start(initialPath: SlidePath | null = null): void {
    if (initialPath !== null) {
      try {
        this.controller.jumpTo(initialPath);
      } catch (error) {
        if (!(error instanceof InvalidPathError)) throw error;
        console.warn(`⚠️ Ignoring starting path ${JSON.stringify(initialPath)}: ${error.message}`);
      }
    }

    console.log(`🎬 Presentation started at ${JSON.stringify(this.controller.getCursor().path)}`);
    this.redraw();
  }

  /**
   * Apply a navigation message from an input event.
   *
   * Returns null when the message was rejected (invalid jump target);
   * the cursor is unchanged and the error reporter is notified.
   */
  dispatch(message: unknown): NavigationResult | null {
    let result: NavigationResult;
    try {
      result = this.messageHandler.handleMessage(message);
    } catch (error) {
      if (error instanceof InvalidPathError) {
        console.warn(`⚠️ Navigation rejected: ${error.message}`);
        this.errorReporter?.showNavigationNotice(error);
        return null;
      }
      throw error;
    }

    if (result.status === "boundary") {
      console.log(`🛑 Reached ${result.boundary} of deck`);
      return result;
    }

    this.redraw();
    return result;
  }

  getCursor(): Cursor {
    return this.controller.getCursor();
  }

  currentFrame(): VisualFrame {
    const cursor = this.controller.getCursor();
    return this.renderer.render(this.controller.getCurrentNode(), cursor.fragmentIndex);
  }

  status(): NavigationStatus {
    return {
      cursor: this.controller.getCursor(),
      atStart: this.controller.isAtStart(),
      atEnd: this.controller.isAtEnd(),
      position: this.controller.position(),
    };
  }

  private redraw(): void {
    const frame = this.currentFrame();
    this.logMissingAssets(frame);
    this.surface.draw(frame, this.status());
  }

  private logMissingAssets(frame: VisualFrame): void {
    for (const block of frame.blocks) {
      if (block.kind === "image" && block.missing && !this.reportedMissingAssets.has(block.path)) {
        this.reportedMissingAssets.add(block.path);
        console.warn(`🖼️ Missing image asset "${block.path}", showing placeholder`);
      }
    }
  }
}
