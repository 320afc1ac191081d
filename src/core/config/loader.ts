import * as path from 'node:path';
import { AnalysisOptionsSchema, type AnalysisOptions } from './schema.js';
import { fileExists } from '../../utils/file-system.js';
import { loadYamlWithSchema, parseYamlWithSchema } from '../../utils/yaml.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_OPTIONS_PATH = 'analysis_options.yaml';

/**
 * Options used when no file exists: no rules enabled, no overrides.
 */
export function getDefaultOptions(): AnalysisOptions {
  return AnalysisOptionsSchema.parse({});
}

/**
 * Load analysis options for a project.
 * Falls back to defaults if the file doesn't exist.
 */
export async function loadAnalysisOptions(
  projectRoot: string,
  optionsPath?: string
): Promise<AnalysisOptions> {
  const fullPath = path.resolve(projectRoot, optionsPath ?? DEFAULT_OPTIONS_PATH);

  if (!(await fileExists(fullPath))) {
    return getDefaultOptions();
  }

  try {
    return await loadYamlWithSchema(fullPath, AnalysisOptionsSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load analysis options from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

/**
 * Parse analysis options from YAML text.
 */
export function parseAnalysisOptions(content: string): AnalysisOptions {
  try {
    return parseYamlWithSchema(content, AnalysisOptionsSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(ErrorCodes.INVALID_CONFIG, error.message);
    }
    throw error;
  }
}
