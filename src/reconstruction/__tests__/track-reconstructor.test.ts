import { describe, it, expect } from 'vitest';
import { TrackReconstructor } from '../track-reconstructor';
import { ChecksumMismatchError, EmptyInputError } from '../../errors';
import { createInMemorySampleLoader } from '../../io/sample-loader';
import type { ClipSampleStream, SampleStreamLoader, SkeletonIndex } from '../../types';
import { SelectionReason } from '../../types';
import { SKELETON_CHECKSUM, clip, quietLogger, skeleton, stream } from '../../__tests__/fixtures';

const skeletons: SkeletonIndex = new Map([[SKELETON_CHECKSUM, skeleton]]);

function reconstructor(loadSampleStream: SampleStreamLoader): TrackReconstructor {
  return new TrackReconstructor({ skeletons, loadSampleStream, logger: quietLogger() });
}

function loader(streams: Record<string, ClipSampleStream>): SampleStreamLoader {
  return createInMemorySampleLoader(new Map(Object.entries(streams)));
}

describe('TrackReconstructor', () => {
  it('rebuilds each source track of a script in order of first reference', () => {
    const clips = [
      clip('WALK_A', 0, 9, { sourceTrack: 'HUM_WALK.ASC' }),
      clip('IDLE', 0, 4, { sourceTrack: 'HUM_IDLE.ASC' }),
      clip('WALK_B', 10, 19, { sourceTrack: 'HUM_WALK.ASC' }),
      clip('MESH', 0, 4, { sourceTrack: 'HUM_BODY.MDM' })
    ];
    const streams = { WALK_A: stream(), WALK_B: stream(), IDLE: stream() };

    const outcomes = reconstructor(loader(streams)).reconstructScript('HUMANS', clips);

    expect(outcomes.map(outcome => [outcome.sourceTrack, outcome.status])).toEqual([
      ['HUM_WALK.ASC', 'reconstructed'],
      ['HUM_IDLE.ASC', 'reconstructed']
    ]);
    const [walk] = outcomes;
    if (walk.status === 'reconstructed') {
      expect(walk.selection.reason).toBe(SelectionReason.BEST_COMBINATION);
      expect(walk.mergedClips.map(entry => entry.name)).toEqual(['WALK_A', 'WALK_B']);
    }
  });

  it('skips a track with mismatched checksums and continues with the next', () => {
    const clips = [
      clip('A', 0, 9, { sourceTrack: 'HUM_A.ASC' }),
      clip('B', 10, 19, { sourceTrack: 'HUM_A.ASC' }),
      clip('C', 0, 9, { sourceTrack: 'HUM_C.ASC' })
    ];
    const streams = { A: stream(), B: stream({ checksum: 11 }), C: stream() };

    const [skipped, rebuilt] = reconstructor(loader(streams)).reconstructScript('HUMANS', clips);

    expect(skipped.status).toBe('skipped');
    if (skipped.status === 'skipped') {
      expect(skipped.error).toBeInstanceOf(ChecksumMismatchError);
      expect(skipped.selection?.reason).toBe(SelectionReason.BEST_COMBINATION);
    }
    expect(rebuilt.status).toBe('reconstructed');
  });

  it('reports an empty track as skipped', () => {
    const outcome = reconstructor(loader({})).reconstructTrack('HUM_A.ASC', []);

    expect(outcome.status).toBe('skipped');
    if (outcome.status === 'skipped') {
      expect(outcome.error).toBeInstanceOf(EmptyInputError);
      expect(outcome.selection).toBeUndefined();
    }
  });

  it('rethrows errors that are not reconstruction errors', () => {
    const broken: SampleStreamLoader = () => {
      throw new TypeError('loader exploded');
    };

    expect(() => reconstructor(broken).reconstructTrack('HUM_A.ASC', [clip('A', 0, 9)])).toThrow('loader exploded');
  });

  it('applies a custom reference frame rate to the largest span tie-break', () => {
    const rebuilder = new TrackReconstructor({
      options: { referenceFps: 30 },
      skeletons,
      loadSampleStream: loader({ A: stream(), B: stream() }),
      logger: quietLogger()
    });

    const outcome = rebuilder.reconstructTrack('HUM_A.ASC', [
      clip('A', 0, 9, { sourceTrack: 'HUM_A.ASC' }),
      clip('B', 0, 9, { sourceTrack: 'HUM_A.ASC', fps: 30 })
    ]);

    expect(outcome.status).toBe('reconstructed');
    if (outcome.status === 'reconstructed') {
      expect(outcome.selection.reason).toBe(SelectionReason.LARGEST_SPAN);
      expect(outcome.selection.chosen.map(entry => entry.name)).toEqual(['B']);
    }
  });
});
