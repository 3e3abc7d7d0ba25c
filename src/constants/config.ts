/**
 * Configuration Constants
 */

/**
 * Default Configuration Values
 */
export const DEFAULT_CONFIG = {
  DEBUG: false,
  OUTPUT_DIR: './output',
  CLEAN_OUTPUT_DIR: false,
  EXPORT_GLB: false,
  SOURCE_TRACK_EXTENSIONS: ['.asc'],
  CONFIG_FILE: 'config.json',
} as const;

/**
 * File suffixes used to discover collaborator files on disk
 */
export const FILE_SUFFIXES = {
  SKELETON: '.skeleton.json',
  SCRIPT: '.script.json',
  SAMPLES: '.samples.json',
  TRACK_DOCUMENT: '.json',
  GLB: '.glb',
} as const;
