/**
 * Sample Decoder
 *
 * Turns a clip's flat sample stream into per-bone translation and rotation
 * maps. The bone of each sample comes from the stream's bone index cycle,
 * which repeats once per frame.
 */

import type { BoneTrack, ClipSampleStream, PerBoneTrack, SkeletonRecord } from '../types';
import { ANIMATION } from '../constants/animation';
import { ERROR_MESSAGES } from '../constants/errors';
import { AnimErrorFactory } from '../errors';
import { roundQuat, roundVec3 } from '../utils/rounding';

export function createBoneTrack(): BoneTrack {
  return {
    translation: new Map(),
    rotation: new Map()
  };
}

/**
 * Decode a sample stream against its skeleton.
 *
 * Keys are the clip-local flat sample indices, starting at 0 for every clip;
 * they are not offset by the clip's first frame.
 */
export function decodeSamples(
  stream: ClipSampleStream,
  skeleton: SkeletonRecord,
  precision: number = ANIMATION.SAMPLE_PRECISION
): PerBoneTrack {
  if (stream.checksum !== skeleton.checksum) {
    throw AnimErrorFactory.checksumMismatch(
      ERROR_MESSAGES.STREAM_SKELETON_MISMATCH,
      [stream.checksum, skeleton.checksum]
    );
  }

  const cycle = stream.boneIndexCycle;
  if (stream.samples.length > 0 && cycle.length === 0) {
    throw AnimErrorFactory.sampleDecodeError(ERROR_MESSAGES.EMPTY_BONE_CYCLE, 0);
  }

  const bones: PerBoneTrack = new Map();
  let boneOffset = 0;

  for (let sampleIndex = 0; sampleIndex < stream.samples.length; sampleIndex++) {
    if (boneOffset >= cycle.length) {
      boneOffset = 0;
    }

    const boneIndex = cycle[boneOffset];
    const bone = skeleton.bones[boneIndex];
    if (!bone) {
      throw AnimErrorFactory.sampleDecodeError(ERROR_MESSAGES.BONE_INDEX_OUT_OF_RANGE, sampleIndex, {
        boneIndex,
        boneCount: skeleton.bones.length
      });
    }

    let track = bones.get(bone.name);
    if (!track) {
      track = createBoneTrack();
      bones.set(bone.name, track);
    }

    const sample = stream.samples[sampleIndex];
    track.translation.set(sampleIndex, roundVec3(sample.position, precision));
    track.rotation.set(sampleIndex, roundQuat(sample.rotation, precision));

    boneOffset++;
  }

  return bones;
}
