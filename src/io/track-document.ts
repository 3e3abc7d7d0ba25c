/**
 * Track Document
 *
 * Builds the JSON document handed to the downstream bake step: the matched
 * skeleton plus the merged animation, with fixed snake_case key names and
 * sample maps keyed by decimal-string sample indices.
 */

import { ANIMATION } from '../constants/animation';
import type { Clip, MergedTrack, SelectionReason, SelectionResult, SkeletonRecord } from '../types';
import { roundTo } from '../utils/rounding';

export type SampleMapDocument = Record<string, number[]>;

export interface BoneFramesDocument {
  translation: SampleMapDocument;
  rotation: SampleMapDocument;
}

export interface SourceClipDocument {
  name: string;
  first_frame: number;
  last_frame: number;
  fps: number;
  speed_modifier: number;
}

export interface SourceScriptDocument {
  name: string;
  source_track: string;
  reason: SelectionReason;
  clips: SourceClipDocument[];
}

export interface HierarchyDocument {
  checksum: number;
  bones: Array<{ index: number; name: string; parent_index: number }>;
}

export interface AnimationDocument {
  checksum: number;
  frame_count: number;
  fps: number;
  fps_source: number;
  layer: number;
  source_script: SourceScriptDocument;
  frames: Record<string, BoneFramesDocument>;
}

export interface TrackDocument {
  hierarchy: HierarchyDocument;
  animation: AnimationDocument;
}

export interface TrackDocumentInput {
  scriptName: string;
  track: MergedTrack;
  skeleton: SkeletonRecord;
  selection: SelectionResult;
  /**
   * Clips whose samples were merged. Defaults to the selection's chosen clips.
   */
  mergedClips?: readonly Clip[];
  precision?: number;
}

function toSampleMapDocument(samples: ReadonlyMap<number, readonly number[]>, precision: number): SampleMapDocument {
  return Object.fromEntries(
    [...samples].map(([sampleIndex, value]): [string, number[]] => [
      String(sampleIndex),
      value.map(component => roundTo(component, precision))
    ])
  );
}

function toClipDocument(clip: Clip): SourceClipDocument {
  return {
    name: clip.name,
    first_frame: clip.firstFrame,
    last_frame: clip.lastFrame,
    fps: clip.fps,
    speed_modifier: clip.speedModifier
  };
}

export function buildHierarchyDocument(skeleton: SkeletonRecord): HierarchyDocument {
  return {
    checksum: skeleton.checksum,
    bones: skeleton.bones.map(bone => ({
      index: bone.index,
      name: bone.name,
      parent_index: bone.parentIndex ?? ANIMATION.ROOT_PARENT_INDEX
    }))
  };
}

export function buildTrackDocument(input: TrackDocumentInput): TrackDocument {
  const { track, skeleton, selection } = input;
  const precision = input.precision ?? ANIMATION.SAMPLE_PRECISION;

  // own properties, so a bone named "__proto__" stays a key
  const frames: Record<string, BoneFramesDocument> = Object.fromEntries(
    [...track.bones].map(([boneName, boneTrack]): [string, BoneFramesDocument] => [
      boneName,
      {
        translation: toSampleMapDocument(boneTrack.translation, precision),
        rotation: toSampleMapDocument(boneTrack.rotation, precision)
      }
    ])
  );

  return {
    hierarchy: buildHierarchyDocument(skeleton),
    animation: {
      checksum: track.checksum,
      frame_count: track.frameCount,
      fps: track.fps,
      fps_source: track.fpsSource,
      layer: track.layer,
      source_script: {
        name: input.scriptName,
        source_track: track.sourceTrack,
        reason: selection.reason,
        clips: (input.mergedClips ?? selection.chosen).map(toClipDocument)
      },
      frames
    }
  };
}

export function serializeTrackDocument(document: TrackDocument): string {
  return JSON.stringify(document, null, 4);
}
