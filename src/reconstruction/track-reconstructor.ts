/**
 * Track Reconstructor
 *
 * Runs clip grouping, selection and merging for every source track of a
 * script. A track that fails is logged and skipped; the others still run.
 */

import type {
  Clip,
  MergedTrack,
  ReconstructionOptions,
  SampleStreamLoader,
  SelectionResult,
  SkeletonIndex,
  SkeletonRecord
} from '../types';
import { ANIMATION } from '../constants/animation';
import { DEFAULT_CONFIG } from '../constants/config';
import { ChecksumMismatchError, UnknownSkeletonError, isTrackError, type TrackError } from '../errors';
import { Logger, LoggerFactory } from '../utils';
import { groupClipsBySourceTrack } from './clip-grouper';
import { CombinationSelector } from './combination-selector';
import { TrackMerger } from './track-merger';

/**
 * Everything a reconstructor needs, fixed at construction
 */
export interface ReconstructionContext {
  readonly options?: Partial<ReconstructionOptions>;
  readonly skeletons: SkeletonIndex;
  readonly loadSampleStream: SampleStreamLoader;
  readonly logger?: Logger;
  readonly selectionLogger?: Logger;
}

export interface ReconstructedTrack {
  readonly status: 'reconstructed';
  readonly sourceTrack: string;
  readonly selection: SelectionResult;
  readonly track: MergedTrack;
  readonly skeleton: SkeletonRecord;
  readonly mergedClips: readonly Clip[];
}

export interface SkippedTrack {
  readonly status: 'skipped';
  readonly sourceTrack: string;
  readonly error: TrackError;
  readonly selection?: SelectionResult;
}

export type TrackOutcome = ReconstructedTrack | SkippedTrack;

export class TrackReconstructor {
  private readonly options: Readonly<ReconstructionOptions>;
  private readonly logger: Logger;
  private readonly selector: CombinationSelector;
  private readonly merger: TrackMerger;

  constructor(context: ReconstructionContext) {
    this.options = Object.freeze({
      sourceTrackExtensions: [...(context.options?.sourceTrackExtensions ?? DEFAULT_CONFIG.SOURCE_TRACK_EXTENSIONS)],
      referenceFps: context.options?.referenceFps ?? ANIMATION.REFERENCE_FPS,
      samplePrecision: context.options?.samplePrecision ?? ANIMATION.SAMPLE_PRECISION
    });
    this.logger = context.logger ?? LoggerFactory.forPipeline();
    this.selector = new CombinationSelector({
      referenceFps: this.options.referenceFps,
      logger: context.selectionLogger ?? this.logger
    });
    this.merger = new TrackMerger({
      skeletons: context.skeletons,
      loadSampleStream: context.loadSampleStream,
      samplePrecision: this.options.samplePrecision,
      logger: this.logger
    });
  }

  /**
   * Rebuild every source track a script's clips reference, in the order the
   * tracks are first referenced
   */
  reconstructScript(scriptName: string, clips: readonly Clip[]): TrackOutcome[] {
    const groups = groupClipsBySourceTrack(clips, {
      sourceTrackExtensions: this.options.sourceTrackExtensions,
      logger: this.logger
    });

    this.logger.debug(`Script ${scriptName} references ${groups.size} source track(s)`, {
      script: scriptName,
      clips: clips.length,
      sourceTracks: [...groups.keys()]
    });

    const outcomes: TrackOutcome[] = [];
    for (const [sourceTrack, trackClips] of groups) {
      outcomes.push(this.reconstructTrack(sourceTrack, trackClips, scriptName));
    }
    return outcomes;
  }

  /**
   * Rebuild one source track from its candidate clips
   */
  reconstructTrack(sourceTrack: string, clips: readonly Clip[], scriptName?: string): TrackOutcome {
    let selection: SelectionResult | undefined;

    try {
      selection = this.selector.select(sourceTrack, clips);
      const { track, skeleton, mergedClips } = this.merger.merge(sourceTrack, selection.chosen);
      return { status: 'reconstructed', sourceTrack, selection, track, skeleton, mergedClips };
    } catch (error) {
      if (!isTrackError(error)) {
        throw error;
      }

      this.logger.error(`Skipping source track ${sourceTrack}: ${error.message}`, {
        sourceTrack,
        script: scriptName,
        code: error.code,
        checksums: describeChecksums(error)
      });

      return selection
        ? { status: 'skipped', sourceTrack, error, selection }
        : { status: 'skipped', sourceTrack, error };
    }
  }
}

function describeChecksums(error: TrackError): number[] | undefined {
  if (error instanceof ChecksumMismatchError) {
    return error.checksums;
  }
  if (error instanceof UnknownSkeletonError) {
    return [error.checksum];
  }
  return undefined;
}
