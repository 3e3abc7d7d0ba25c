import { describe, it, expect } from 'vitest';
import { NodeIO } from '@gltf-transform/core';
import { buildTrackGltfDocument, exportTrackToGlb } from '../gltf-exporter';
import { decodeSamples } from '../../reconstruction/sample-decoder';
import type { MergedTrack } from '../../types';
import { SKELETON_CHECKSUM, quietLogger, skeleton, stream } from '../../__tests__/fixtures';

const track: MergedTrack = {
  sourceTrack: 'HUM_BODY.ASC',
  checksum: SKELETON_CHECKSUM,
  frameCount: 2,
  fps: 25,
  fpsSource: 25,
  layer: 1,
  bones: decodeSamples(stream(), skeleton)
};

describe('buildTrackGltfDocument', () => {
  it('creates a node per bone under the skeleton hierarchy', () => {
    const root = buildTrackGltfDocument(track, skeleton).getRoot();

    expect(root.listNodes().map(node => node.getName())).toEqual(['BIP01', 'BIP01 SPINE', 'BIP01 HEAD']);

    const scene = root.getDefaultScene();
    expect(scene?.getName()).toBe('HUM_BODY.ASC');
    const [hip] = scene?.listChildren() ?? [];
    expect(hip.getName()).toBe('BIP01');
    expect(hip.listChildren().map(node => node.getName())).toEqual(['BIP01 SPINE']);
    expect(hip.listChildren()[0].listChildren().map(node => node.getName())).toEqual(['BIP01 HEAD']);
  });

  it('treats bones whose parent comes later as roots', () => {
    const root = buildTrackGltfDocument(track, {
      checksum: SKELETON_CHECKSUM,
      bones: [
        { index: 0, name: 'A', parentIndex: 1 },
        { index: 1, name: 'B', parentIndex: -1 }
      ]
    }).getRoot();

    expect(root.getDefaultScene()?.listChildren().map(node => node.getName())).toEqual(['A', 'B']);
  });

  it('adds a translation and a rotation channel per animated bone', () => {
    const [animation] = buildTrackGltfDocument(track, skeleton).getRoot().listAnimations();

    expect(animation.getName()).toBe('HUM_BODY.ASC');
    expect(
      animation.listChannels().map(channel => [channel.getTargetNode()?.getName(), channel.getTargetPath()])
    ).toEqual([
      ['BIP01', 'translation'],
      ['BIP01', 'rotation'],
      ['BIP01 HEAD', 'translation'],
      ['BIP01 HEAD', 'rotation']
    ]);
  });

  it('places keyframe n at n / fps seconds in sample order', () => {
    const [animation] = buildTrackGltfDocument(track, skeleton).getRoot().listAnimations();
    const sampler = animation.listChannels()[0].getSampler();
    const times = Array.from(sampler?.getInput()?.getArray() ?? new Float32Array());

    expect(times).toHaveLength(2);
    expect(times[0]).toBe(0);
    expect(times[1]).toBeCloseTo(0.04, 6);
    expect(Array.from(sampler?.getOutput()?.getArray() ?? new Float32Array())).toEqual([1, 2, 3, 7, 8, 9]);
    expect(sampler?.getInterpolation()).toBe('LINEAR');
  });
});

describe('exportTrackToGlb', () => {
  it('writes a binary glTF that reads back with the same animation', async () => {
    const bytes = await exportTrackToGlb(track, skeleton, quietLogger());

    expect(Array.from(bytes.slice(0, 4))).toEqual([0x67, 0x6c, 0x54, 0x46]);

    const document = await new NodeIO().readBinary(bytes);
    expect(document.getRoot().listNodes()).toHaveLength(3);
    expect(document.getRoot().listAnimations()[0].listChannels()).toHaveLength(4);
  });
});
