/**
 * @fileoverview Presenter configuration schema
 * @module core/settingsSchema
 *
 * Configuration is written as YAML by the deck author and validated here.
 * Every field has a default, so an empty config (or none at all) is valid.
 *
 * Example:
 *   keymap:
 *     advance: [ArrowRight, " "]
 *     retreat: [ArrowLeft]
 *   rendering:
 *     languageAliases:
 *       elisp: lisp
 */

import { z } from "zod";

const KeyList = z.array(z.string().min(1)).min(1);

export const KeymapSchema = z.object({
  advance: KeyList.default(["ArrowRight", "ArrowDown", " ", "PageDown", "n"]),
  retreat: KeyList.default(["ArrowLeft", "ArrowUp", "Backspace", "PageUp", "p"]),
  first: KeyList.default(["Home"]),
});

export const RenderingSettingsSchema = z.object({
  // Off: every code block is plain monospaced text
  highlight: z.boolean().default(true),
  // Deck language tag -> highlight.js language name
  languageAliases: z.record(z.string(), z.string()).default({}),
  placeholderText: z.string().min(1).default("Image unavailable"),
  showNotes: z.boolean().default(false),
});

export const AssetSettingsSchema = z.object({
  // HEAD-request every image at load time so missing ones render as placeholders
  probe: z.boolean().default(true),
});

export const PresenterConfigSchema = z.object({
  keymap: KeymapSchema.default({}),
  rendering: RenderingSettingsSchema.default({}),
  assets: AssetSettingsSchema.default({}),
  // Keep location.hash in step with the cursor ("#/1/0")
  syncHash: z.boolean().default(true),
});

export type Keymap = z.infer<typeof KeymapSchema>;
export type PresenterConfig = z.infer<typeof PresenterConfigSchema>;

export function getDefaultPresenterConfig(): PresenterConfig {
  return PresenterConfigSchema.parse({});
}
