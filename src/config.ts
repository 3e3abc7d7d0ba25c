/**
 * Configuration loading
 *
 * Parses and validates the rebuilder configuration, from an object or from
 * a JSON file.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ZodError } from 'zod';
import { ERROR_MESSAGES } from './constants/errors';
import { AnimErrorFactory } from './errors';
import { AnimTrackRebuilderConfigSchema, type AnimTrackRebuilderConfig } from './schemas';
import { resolveDirectory } from './utils';

/**
 * Validate a configuration object and fill in defaults.
 * Relative directories are resolved against `baseDir`.
 */
export function parseConfig(input: unknown, baseDir: string = process.cwd()): Readonly<AnimTrackRebuilderConfig> {
  let config: AnimTrackRebuilderConfig;
  try {
    config = AnimTrackRebuilderConfigSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw AnimErrorFactory.configError(
        ERROR_MESSAGES.INVALID_CONFIG,
        'AnimTrackRebuilderConfig',
        { zodError: error, issues: error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`) }
      );
    }
    throw error;
  }

  const extractDir = resolveDirectory(config.extractDir, baseDir);
  return Object.freeze({
    ...config,
    extractDir,
    hierarchyDir: config.hierarchyDir ? resolveDirectory(config.hierarchyDir, baseDir) : extractDir,
    outputDir: resolveDirectory(config.outputDir, baseDir),
    sourceTrackExtensions: [...config.sourceTrackExtensions]
  });
}

/**
 * Read a JSON configuration file. Relative directories in it resolve against
 * the working directory.
 */
export function loadConfigFile(filePath: string, baseDir: string = process.cwd()): Readonly<AnimTrackRebuilderConfig> {
  const resolved = path.resolve(baseDir, filePath);

  let text: string;
  try {
    text = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    throw AnimErrorFactory.fileSystemError(
      `Can't find config file ${resolved}`,
      resolved,
      'read_config',
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw AnimErrorFactory.configError(
      `Config file ${resolved} is not valid JSON`,
      'configFile',
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }

  return parseConfig(raw, baseDir);
}
