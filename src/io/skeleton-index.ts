/**
 * Skeleton Index
 *
 * Builds the checksum → skeleton mapping every reconstruction resolves bone
 * names against. Built once per run, before any track is processed.
 */

import { FILE_SUFFIXES } from '../constants/config';
import { ERROR_MESSAGES } from '../constants/errors';
import { AnimErrorFactory } from '../errors';
import { SkeletonFileSchema, type SkeletonFile } from '../schemas';
import type { SkeletonChecksum, SkeletonIndex, SkeletonRecord } from '../types';
import { Logger, findFilesBySuffix, isDirectory } from '../utils';
import { readJsonFile } from './json-file';

export function toSkeletonRecord(file: SkeletonFile): SkeletonRecord {
  return {
    checksum: file.checksum,
    bones: file.bones.map((bone, index) => ({
      index,
      name: bone.name,
      parentIndex: bone.parentIndex
    }))
  };
}

export function loadSkeletonFile(filePath: string): SkeletonRecord {
  return toSkeletonRecord(readJsonFile(filePath, SkeletonFileSchema));
}

/**
 * Index skeletons by checksum. A later record with the same checksum
 * replaces the earlier one.
 */
export function buildSkeletonIndex(records: Iterable<SkeletonRecord>, logger?: Logger): SkeletonIndex {
  const index = new Map<SkeletonChecksum, SkeletonRecord>();
  for (const record of records) {
    if (index.has(record.checksum)) {
      logger?.warn(`Duplicate skeleton checksum ${record.checksum}, keeping the later one`, {
        checksum: record.checksum
      });
    }
    index.set(record.checksum, record);
  }
  return index;
}

/**
 * Load every skeleton file below a directory.
 * Throws when the directory is missing or holds no skeleton files: nothing
 * can be reconstructed without them.
 */
export function loadSkeletonIndex(dirPath: string, logger?: Logger): SkeletonIndex {
  if (!isDirectory(dirPath)) {
    throw AnimErrorFactory.fileSystemError(
      `${ERROR_MESSAGES.DIRECTORY_NOT_FOUND}: ${dirPath}`,
      dirPath,
      'load_skeleton_index'
    );
  }

  const files = findFilesBySuffix(dirPath, FILE_SUFFIXES.SKELETON);
  if (files.length === 0) {
    throw AnimErrorFactory.fileSystemError(
      `${ERROR_MESSAGES.NO_HIERARCHY_INDEX} in ${dirPath}`,
      dirPath,
      'load_skeleton_index'
    );
  }

  const records = files.map(filePath => {
    const record = loadSkeletonFile(filePath);
    logger?.debug(`Loaded skeleton ${record.checksum}`, { filePath, bones: record.bones.length });
    return record;
  });

  const index = buildSkeletonIndex(records, logger);
  logger?.info(`Indexed ${index.size} skeleton(s)`, { filePath: dirPath, files: files.length });
  return index;
}
