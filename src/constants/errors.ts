/**
 * Error Constants for the track rebuilder
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  CHECKSUM_MISMATCH: 'ANIM_CHECKSUM_MISMATCH',
  UNKNOWN_SKELETON: 'ANIM_UNKNOWN_SKELETON',
  EMPTY_INPUT: 'ANIM_EMPTY_INPUT',
  SAMPLE_DECODE_ERROR: 'ANIM_SAMPLE_DECODE_ERROR',
  SCHEMA_VALIDATION_ERROR: 'ANIM_SCHEMA_VALIDATION_ERROR',
  CONFIG_VALIDATION_ERROR: 'ANIM_CONFIG_VALIDATION_ERROR',
  FILE_SYSTEM_ERROR: 'ANIM_FILE_SYSTEM_ERROR',
} as const;

/**
 * Error Messages
 */
export const ERROR_MESSAGES = {
  CHECKSUMS_DIFFER: 'Clip sample streams reference different skeleton checksums',
  STREAM_SKELETON_MISMATCH: 'Sample stream checksum does not match the skeleton',
  UNKNOWN_SKELETON: 'No skeleton found for checksum',
  NO_CLIPS: 'Source track has no usable clips',
  NO_STREAMS: 'None of the chosen clips has a sample stream',
  EMPTY_BONE_CYCLE: 'Sample stream has samples but an empty bone index cycle',
  BONE_INDEX_OUT_OF_RANGE: 'Bone index cycle references a bone outside the skeleton',
  INVALID_CONFIG: 'Invalid configuration',
  NO_HIERARCHY_INDEX: 'No skeleton hierarchy files found',
  DIRECTORY_NOT_FOUND: 'Directory does not exist',
  OUTPUT_PATH_TAKEN: 'Output path already written in this run',
} as const;
