/**
 * @fileoverview Presenter configuration loading
 * @module initialization/configLoader
 *
 * The page may embed YAML configuration:
 *
 *   <script type="text/yaml" id="deck-config">
 *   rendering:
 *     showNotes: true
 *   </script>
 *
 * Missing or empty config means defaults. Malformed YAML and schema
 * violations are fatal: the author has to fix the page.
 */

import yaml from 'js-yaml';
import { ZodError } from 'zod';
import {
  PresenterConfigSchema,
  getDefaultPresenterConfig,
  type PresenterConfig,
} from '../core/settingsSchema';

export const CONFIG_ELEMENT_ID = 'deck-config';

/**
 * Error thrown when the config is not valid YAML
 */
export class ConfigParseError extends Error {
  public readonly yamlError: Error;

  constructor(yamlError: Error) {
    super(`Failed to parse presenter config: ${yamlError.message}`);
    this.name = 'ConfigParseError';
    this.yamlError = yamlError;
  }
}

/**
 * Error thrown when the config does not match PresenterConfigSchema
 */
export class ConfigValidationError extends Error {
  public readonly zodError: ZodError;

  constructor(zodError: ZodError) {
    super(
      'Presenter config validation failed: ' +
      zodError.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
    );
    this.name = 'ConfigValidationError';
    this.zodError = zodError;
  }
}

/**
 * Parse and validate YAML presenter config.
 *
 * @throws {ConfigParseError} If the YAML is malformed
 * @throws {ConfigValidationError} If the values violate the schema
 */
export function parsePresenterConfig(yamlText: string): PresenterConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(yamlText);
  } catch (error) {
    console.error('❌ Presenter config YAML error:', error);
    throw new ConfigParseError(error instanceof Error ? error : new Error(String(error)));
  }

  // Empty document
  if (parsed === undefined || parsed === null) {
    return getDefaultPresenterConfig();
  }

  const result = PresenterConfigSchema.safeParse(parsed);
  if (!result.success) {
    console.error('❌ Presenter config validation error:', result.error.issues);
    throw new ConfigValidationError(result.error);
  }

  return result.data;
}

/**
 * Read config from the embedded script element, falling back to defaults.
 */
export function loadPresenterConfig(root: Document = document): PresenterConfig {
  const element = root.getElementById(CONFIG_ELEMENT_ID);

  if (!element || !element.textContent || element.textContent.trim() === '') {
    console.log('⚙️ No presenter config found, using defaults');
    return getDefaultPresenterConfig();
  }

  const config = parsePresenterConfig(element.textContent);
  console.log('✅ Presenter config loaded');
  return config;
}
