import type { Clip, ClipSampleStream, RawSample, SkeletonRecord } from '../types';
import { LogLevel, createLogger } from '../utils';

export const quietLogger = () => createLogger({ level: LogLevel.ERROR, sink: () => undefined });

export function clip(
  name: string,
  firstFrame: number,
  lastFrame: number,
  overrides: Partial<Clip> = {}
): Clip {
  return {
    name,
    sourceTrack: 'HUM_BODY.ASC',
    firstFrame,
    lastFrame,
    fps: 25,
    speedModifier: 0,
    ...overrides
  };
}

export const SKELETON_CHECKSUM = 4242;

export const skeleton: SkeletonRecord = {
  checksum: SKELETON_CHECKSUM,
  bones: [
    { index: 0, name: 'BIP01', parentIndex: -1 },
    { index: 1, name: 'BIP01 SPINE', parentIndex: 0 },
    { index: 2, name: 'BIP01 HEAD', parentIndex: 1 }
  ]
};

export function sample(
  position: [number, number, number],
  rotation: [number, number, number, number] = [0, 0, 0, 1]
): RawSample {
  return { position, rotation };
}

export function stream(overrides: Partial<ClipSampleStream> = {}): ClipSampleStream {
  return {
    checksum: SKELETON_CHECKSUM,
    frameCount: 2,
    fps: 25,
    fpsSource: 25,
    layer: 1,
    boneIndexCycle: [0, 2],
    samples: [
      sample([1, 2, 3]),
      sample([4, 5, 6]),
      sample([7, 8, 9]),
      sample([10, 11, 12])
    ],
    ...overrides
  };
}
