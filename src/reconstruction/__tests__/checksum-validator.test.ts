import { describe, it, expect } from 'vitest';
import { validateSkeleton } from '../checksum-validator';
import { ChecksumMismatchError, UnknownSkeletonError } from '../../errors';
import type { SkeletonIndex } from '../../types';
import { SKELETON_CHECKSUM, skeleton, stream } from '../../__tests__/fixtures';

const skeletons: SkeletonIndex = new Map([[SKELETON_CHECKSUM, skeleton]]);

describe('validateSkeleton', () => {
  it('returns the skeleton every stream refers to', () => {
    expect(validateSkeleton([stream(), stream({ layer: 3 })], skeletons)).toBe(skeleton);
  });

  it('rejects streams with different checksums', () => {
    let caught: unknown;
    try {
      validateSkeleton([stream(), stream({ checksum: 17 })], skeletons, 'HUM_BODY.ASC');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ChecksumMismatchError);
    if (caught instanceof ChecksumMismatchError) {
      expect(caught.checksums).toEqual([SKELETON_CHECKSUM, 17]);
      expect(caught.context).toMatchObject({ sourceTrack: 'HUM_BODY.ASC' });
    }
  });

  it('rejects an empty stream list', () => {
    expect(() => validateSkeleton([], skeletons)).toThrow(ChecksumMismatchError);
  });

  it('rejects a checksum missing from the index', () => {
    let caught: unknown;
    try {
      validateSkeleton([stream({ checksum: 99 }), stream({ checksum: 99 })], skeletons);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(UnknownSkeletonError);
    if (caught instanceof UnknownSkeletonError) {
      expect(caught.checksum).toBe(99);
      expect(caught.message).toBe('No skeleton found for checksum 99');
    }
  });
});
