/**
 * Document Writer
 *
 * Writes track documents and glTF exports to the output directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { AnimErrorFactory } from '../errors';
import { Logger, LoggerFactory, ensureDirectoryExists } from '../utils';
import { serializeTrackDocument, type TrackDocument } from './track-document';

function writeFile(filePath: string, data: string | Uint8Array, logger: Logger): number {
  try {
    ensureDirectoryExists(path.dirname(filePath));
    fs.writeFileSync(filePath, data);
  } catch (error) {
    throw AnimErrorFactory.fileSystemError(
      `Could not write ${filePath}`,
      filePath,
      'write',
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }

  const fileSize = typeof data === 'string' ? Buffer.byteLength(data, 'utf-8') : data.byteLength;
  logger.logFileOperation('write', filePath, fileSize);
  return fileSize;
}

/**
 * Write a track document as indented UTF-8 JSON. Returns the byte count.
 */
export function writeTrackDocument(
  filePath: string,
  document: TrackDocument,
  logger: Logger = LoggerFactory.forFileOperations()
): number {
  return writeFile(filePath, serializeTrackDocument(document), logger);
}

/**
 * Write a binary glTF buffer. Returns the byte count.
 */
export function writeBinaryFile(
  filePath: string,
  data: Uint8Array,
  logger: Logger = LoggerFactory.forFileOperations()
): number {
  return writeFile(filePath, data, logger);
}

/**
 * Remove and recreate a directory
 */
export function resetDirectory(dirPath: string, logger: Logger = LoggerFactory.forFileOperations()): void {
  try {
    fs.rmSync(dirPath, { recursive: true, force: true });
    fs.mkdirSync(dirPath, { recursive: true });
  } catch (error) {
    throw AnimErrorFactory.fileSystemError(
      `Could not reset ${dirPath}`,
      dirPath,
      'reset',
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }
  logger.logFileOperation('reset', dirPath);
}
