/**
 * Skeleton Checksum Validator
 *
 * Gates a merge on every clip stream sharing one known skeleton.
 */

import type { ClipSampleStream, SkeletonIndex, SkeletonRecord } from '../types';
import { ERROR_MESSAGES } from '../constants/errors';
import { AnimErrorFactory } from '../errors';

/**
 * Returns the skeleton shared by all streams.
 * Throws ChecksumMismatchError unless exactly one checksum is present, and
 * UnknownSkeletonError when that checksum is not indexed.
 */
export function validateSkeleton(
  streams: readonly ClipSampleStream[],
  skeletons: SkeletonIndex,
  sourceTrack?: string
): SkeletonRecord {
  const checksums = [...new Set(streams.map(stream => stream.checksum))];

  if (checksums.length !== 1) {
    throw AnimErrorFactory.checksumMismatch(ERROR_MESSAGES.CHECKSUMS_DIFFER, checksums, { sourceTrack });
  }

  const [checksum] = checksums;
  const skeleton = skeletons.get(checksum);
  if (!skeleton) {
    throw AnimErrorFactory.unknownSkeleton(`${ERROR_MESSAGES.UNKNOWN_SKELETON} ${checksum}`, checksum, { sourceTrack });
  }

  return skeleton;
}
