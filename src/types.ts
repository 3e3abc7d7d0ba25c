/**
 * Core Types for the track rebuilder
 *
 * Input record types are inferred from the schemas; the reconstruction
 * results are declared here.
 */

import type { Clip, ClipSampleStream } from './schemas';

export type {
  AnimTrackRebuilderConfig,
  AnimTrackRebuilderConfigInput,
  ReconstructionOptions,
  Clip,
  RawSample,
  ClipSampleStream,
  ScriptFile,
  SkeletonFile,
} from './schemas';

export type SkeletonChecksum = number;

export type Vec3 = readonly [number, number, number];
export type Quat = readonly [number, number, number, number];

/**
 * Bone of a skeleton. `index` is the bone's position in the skeleton.
 */
export interface SkeletonBone {
  readonly index: number;
  readonly name: string;
  readonly parentIndex?: number | undefined;
}

export interface SkeletonRecord {
  readonly checksum: SkeletonChecksum;
  readonly bones: readonly SkeletonBone[];
}

export type SkeletonIndex = ReadonlyMap<SkeletonChecksum, SkeletonRecord>;

/**
 * Decoded samples of one bone, keyed by clip-local flat sample index
 */
export interface BoneTrack {
  translation: Map<number, Vec3>;
  rotation: Map<number, Quat>;
}

/**
 * Decoded samples of every bone a stream touches, keyed by bone name
 */
export type PerBoneTrack = Map<string, BoneTrack>;

export interface MergedTrack {
  readonly sourceTrack: string;
  readonly checksum: SkeletonChecksum;
  readonly frameCount: number;
  readonly fps: number;
  readonly fpsSource: number;
  readonly layer: number;
  readonly bones: PerBoneTrack;
}

/**
 * Why the combination selector picked the clips it did
 */
export enum SelectionReason {
  TRIVIAL = 'single clip',
  BEST_COMBINATION = 'best combination',
  LARGEST_SPAN = 'largest frame span',
  NO_FULL_COVER = 'could not find combination covering full range',
}

export interface SelectionResult {
  readonly sourceTrack: string;
  readonly chosen: readonly Clip[];
  readonly dropped: readonly Clip[];
  readonly reason: SelectionReason;
}

/**
 * Raw sample loader: returns the sample stream of a clip, or undefined when
 * the clip has none
 */
export type SampleStreamLoader = (clip: Clip) => ClipSampleStream | undefined;
