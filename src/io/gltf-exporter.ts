/**
 * glTF Exporter
 *
 * Exports a merged track as a binary glTF: one node per bone and a single
 * animation with translation and rotation channels. Keys are taken in
 * ascending sample-index order and keyframe n is placed at n / fps seconds.
 */

import { Accessor, Animation, Buffer as GltfBuffer, Document, Node, NodeIO } from '@gltf-transform/core';
import { ANIMATION } from '../constants/animation';
import type { MergedTrack, SkeletonRecord } from '../types';
import { Logger, LoggerFactory } from '../utils';

type ChannelPath = 'translation' | 'rotation';

const ACCESSOR_TYPES = {
  translation: Accessor.Type.VEC3,
  rotation: Accessor.Type.VEC4
} as const;

/**
 * Create one node per bone. A bone is attached to its parent only when the
 * parent comes earlier in the bone list; anything else becomes a root.
 */
function buildBoneNodes(document: Document, skeleton: SkeletonRecord): { nodes: Map<string, Node>; roots: Node[] } {
  const byIndex: Node[] = [];
  const nodes = new Map<string, Node>();
  const roots: Node[] = [];

  for (const bone of skeleton.bones) {
    const node = document.createNode(bone.name);
    byIndex.push(node);
    if (!nodes.has(bone.name)) {
      nodes.set(bone.name, node);
    }

    const parentIndex = bone.parentIndex ?? ANIMATION.ROOT_PARENT_INDEX;
    if (parentIndex >= 0 && parentIndex < bone.index) {
      byIndex[parentIndex].addChild(node);
    } else {
      roots.push(node);
    }
  }

  return { nodes, roots };
}

function keyTimes(count: number, fps: number): Float32Array {
  const rate = fps > 0 ? fps : 1;
  return Float32Array.from({ length: count }, (_, n) => n / rate);
}

function addChannel(
  document: Document,
  buffer: GltfBuffer,
  animation: Animation,
  target: Node,
  path: ChannelPath,
  samples: ReadonlyMap<number, readonly number[]>,
  fps: number
): void {
  if (samples.size === 0) {
    return;
  }

  const sortedIndices = [...samples.keys()].sort((a, b) => a - b);
  const values: number[] = [];
  for (const sampleIndex of sortedIndices) {
    values.push(...(samples.get(sampleIndex) ?? []));
  }

  const input = document
    .createAccessor()
    .setType(Accessor.Type.SCALAR)
    .setArray(keyTimes(sortedIndices.length, fps))
    .setBuffer(buffer);
  const output = document
    .createAccessor()
    .setType(ACCESSOR_TYPES[path])
    .setArray(new Float32Array(values))
    .setBuffer(buffer);

  const sampler = document
    .createAnimationSampler()
    .setInput(input)
    .setOutput(output)
    .setInterpolation('LINEAR');
  const channel = document
    .createAnimationChannel()
    .setTargetNode(target)
    .setTargetPath(path)
    .setSampler(sampler);

  animation.addSampler(sampler).addChannel(channel);
}

/**
 * Build an in-memory glTF document for a merged track
 */
export function buildTrackGltfDocument(track: MergedTrack, skeleton: SkeletonRecord): Document {
  const document = new Document();
  const buffer = document.createBuffer();
  const scene = document.createScene(track.sourceTrack);
  document.getRoot().setDefaultScene(scene);

  const { nodes, roots } = buildBoneNodes(document, skeleton);
  for (const root of roots) {
    scene.addChild(root);
  }

  const animation = document.createAnimation(track.sourceTrack);
  for (const [boneName, boneTrack] of track.bones) {
    const target = nodes.get(boneName);
    if (!target) {
      continue;
    }
    addChannel(document, buffer, animation, target, 'translation', boneTrack.translation, track.fps);
    addChannel(document, buffer, animation, target, 'rotation', boneTrack.rotation, track.fps);
  }

  return document;
}

/**
 * Export a merged track as GLB bytes
 */
export async function exportTrackToGlb(
  track: MergedTrack,
  skeleton: SkeletonRecord,
  logger: Logger = LoggerFactory.forPipeline()
): Promise<Uint8Array> {
  return logger.withTiming(
    'glb_export',
    () => new NodeIO().writeBinary(buildTrackGltfDocument(track, skeleton)),
    { sourceTrack: track.sourceTrack }
  );
}
