export { isContiguousCover, getFrameBounds, getFrameSpan, formatFrameRange } from './range-analyzer';
export type { FrameRange, FrameBounds } from './range-analyzer';
export {
  CombinationSelector,
  TrivialStrategy,
  ExactCoverStrategy,
  LargestSpanStrategy,
  createDefaultStrategies,
  combinations,
  selectBestCombination
} from './combination-selector';
export type { SelectionStrategy, CombinationSelectorOptions } from './combination-selector';
export { groupClipsBySourceTrack, matchesSourceTrackExtension } from './clip-grouper';
export type { ClipGroupingOptions } from './clip-grouper';
export { validateSkeleton } from './checksum-validator';
export { decodeSamples, createBoneTrack } from './sample-decoder';
export { TrackMerger, foldDecodedTrack } from './track-merger';
export type { TrackMergerContext, MergeOutcome } from './track-merger';
export { TrackReconstructor } from './track-reconstructor';
export type { ReconstructionContext, ReconstructedTrack, SkippedTrack, TrackOutcome } from './track-reconstructor';
