// coreTypes.ts - Shared core types and schemas

import { z } from "zod";

/**
 * Slide path - child indices from the document root, e.g. [2, 0] is the
 * first vertical slide under the third top-level slide.
 */
export const SlidePathSchema = z.array(z.number().int().min(0)).min(1);

export type SlidePath = z.infer<typeof SlidePathSchema>;

/**
 * Cursor into the slide tree. fragmentIndex counts revealed fragments.
 */
export const CursorSchema = z.object({
  path: SlidePathSchema,
  fragmentIndex: z.number().int().min(0),
});

export type Cursor = z.infer<typeof CursorSchema>;

/**
 * Which end of the deck a navigation command ran into
 */
export type Boundary = "start" | "end";

export type NavigationResult =
  | { status: "moved"; cursor: Cursor }
  | { status: "boundary"; boundary: Boundary; cursor: Cursor };

export function pathsEqual(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((index, i) => index === b[i]);
}

// URL hash form used by the surface: [1, 2] <-> "#/1/2"
export function pathToHash(path: readonly number[]): string {
  return `#/${path.join("/")}`;
}

export function hashToPath(hash: string): SlidePath | null {
  const match = /^#\/(\d+(?:\/\d+)*)$/.exec(hash);
  if (!match) return null;
  return match[1].split("/").map((segment) => Number(segment));
}
