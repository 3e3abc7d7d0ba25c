/**
 * Custom Error Classes for track reconstruction
 *
 * Error handling with Zod validation and tagged union pattern.
 */

import { ZodError, type ZodIssue } from 'zod';
import { ERROR_CODES } from './constants/errors';
import type { SkeletonChecksum } from './types';

/**
 * Base Animation Error Class
 *
 * Base error class for all reconstruction operations with tagged union pattern.
 */
export abstract class BaseAnimError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: string;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }

  /**
   * Get error details for logging
   */
  getDetails(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      tag: this._tag,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * Checksum Mismatch Error
 *
 * Clip sample streams disagree on their skeleton, or a stream does not
 * belong to the skeleton it is decoded against.
 */
export class ChecksumMismatchError extends BaseAnimError {
  readonly _tag = 'ChecksumMismatchError' as const;
  readonly code = ERROR_CODES.CHECKSUM_MISMATCH;
  readonly checksums: SkeletonChecksum[];

  constructor(message: string, checksums: SkeletonChecksum[], context?: Record<string, unknown>) {
    super(message, { checksums, ...context });
    this.checksums = checksums;
  }
}

/**
 * Unknown Skeleton Error
 *
 * The checksum shared by the streams is not in the skeleton index.
 */
export class UnknownSkeletonError extends BaseAnimError {
  readonly _tag = 'UnknownSkeletonError' as const;
  readonly code = ERROR_CODES.UNKNOWN_SKELETON;
  readonly checksum: SkeletonChecksum;

  constructor(message: string, checksum: SkeletonChecksum, context?: Record<string, unknown>) {
    super(message, { checksum, ...context });
    this.checksum = checksum;
  }
}

/**
 * Empty Input Error
 *
 * A source track has no clips, or none of its clips has sample data.
 */
export class EmptyInputError extends BaseAnimError {
  readonly _tag = 'EmptyInputError' as const;
  readonly code = ERROR_CODES.EMPTY_INPUT;
  readonly sourceTrack: string;

  constructor(message: string, sourceTrack: string, context?: Record<string, unknown>) {
    super(message, { sourceTrack, ...context });
    this.sourceTrack = sourceTrack;
  }
}

/**
 * Sample Decode Error
 *
 * A sample stream's bone index cycle cannot be resolved against its skeleton.
 */
export class SampleDecodeError extends BaseAnimError {
  readonly _tag = 'SampleDecodeError' as const;
  readonly code = ERROR_CODES.SAMPLE_DECODE_ERROR;
  readonly sampleIndex: number;

  constructor(message: string, sampleIndex: number, context?: Record<string, unknown>) {
    super(message, { sampleIndex, ...context });
    this.sampleIndex = sampleIndex;
  }
}

/**
 * Schema Validation Error
 *
 * An input file failed its Zod schema.
 */
export class AnimSchemaError extends BaseAnimError {
  readonly _tag = 'AnimSchemaError' as const;
  readonly code = ERROR_CODES.SCHEMA_VALIDATION_ERROR;
  readonly path: string;
  readonly zodError?: ZodError;

  constructor(message: string, path: string, zodError?: ZodError) {
    super(message, { path, zodError });
    this.path = path;
    this.zodError = zodError;
  }

  /**
   * Get Zod validation issues
   */
  getValidationIssues(): ZodIssue[] {
    return this.zodError?.issues || [];
  }

  /**
   * Get formatted validation errors
   */
  getFormattedErrors(): string[] {
    return this.zodError?.issues.map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    ) || [];
  }
}

/**
 * Configuration Error
 *
 * Error for configuration validation failures.
 */
export class AnimConfigError extends BaseAnimError {
  readonly _tag = 'AnimConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_VALIDATION_ERROR;
  readonly configKey: string;

  constructor(message: string, configKey: string, context?: Record<string, unknown>) {
    super(message, { configKey, ...context });
    this.configKey = configKey;
  }
}

/**
 * File System Error
 *
 * Error for file system operations.
 */
export class AnimFileSystemError extends BaseAnimError {
  readonly _tag = 'AnimFileSystemError' as const;
  readonly code = ERROR_CODES.FILE_SYSTEM_ERROR;
  readonly filePath: string;
  readonly operation: string;

  constructor(message: string, filePath: string, operation: string, context?: Record<string, unknown>) {
    super(message, { filePath, operation, ...context });
    this.filePath = filePath;
    this.operation = operation;
  }
}

/**
 * Union type for all reconstruction errors
 */
export type AnimError =
  | ChecksumMismatchError
  | UnknownSkeletonError
  | EmptyInputError
  | SampleDecodeError
  | AnimSchemaError
  | AnimConfigError
  | AnimFileSystemError;

/**
 * Errors that abandon a single source track without stopping the run
 */
export type TrackError =
  | ChecksumMismatchError
  | UnknownSkeletonError
  | EmptyInputError
  | SampleDecodeError
  | AnimSchemaError
  | AnimFileSystemError;

/**
 * Check whether a value is one of the reconstruction errors
 */
export function isAnimError(error: unknown): error is AnimError {
  return error instanceof BaseAnimError;
}

/**
 * Check whether an error only concerns the source track it was raised for
 */
export function isTrackError(error: unknown): error is TrackError {
  return isAnimError(error) && !(error instanceof AnimConfigError);
}

/**
 * Error factory functions
 */
export const AnimErrorFactory = {
  /**
   * Create checksum mismatch error
   */
  checksumMismatch(message: string, checksums: SkeletonChecksum[], context?: Record<string, unknown>): ChecksumMismatchError {
    return new ChecksumMismatchError(message, checksums, context);
  },

  /**
   * Create unknown skeleton error
   */
  unknownSkeleton(message: string, checksum: SkeletonChecksum, context?: Record<string, unknown>): UnknownSkeletonError {
    return new UnknownSkeletonError(message, checksum, context);
  },

  /**
   * Create empty input error
   */
  emptyInput(message: string, sourceTrack: string, context?: Record<string, unknown>): EmptyInputError {
    return new EmptyInputError(message, sourceTrack, context);
  },

  /**
   * Create sample decode error
   */
  sampleDecodeError(message: string, sampleIndex: number, context?: Record<string, unknown>): SampleDecodeError {
    return new SampleDecodeError(message, sampleIndex, context);
  },

  /**
   * Create schema validation error
   */
  schemaError(message: string, path: string, zodError?: ZodError): AnimSchemaError {
    return new AnimSchemaError(message, path, zodError);
  },

  /**
   * Create configuration error
   */
  configError(message: string, configKey: string, context?: Record<string, unknown>): AnimConfigError {
    return new AnimConfigError(message, configKey, context);
  },

  /**
   * Create file system error
   */
  fileSystemError(message: string, filePath: string, operation: string, context?: Record<string, unknown>): AnimFileSystemError {
    return new AnimFileSystemError(message, filePath, operation, context);
  },
};
