import * as fs from 'fs';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { AnimTrackRebuilder, defineConfig } from '../index';
import { AnimFileSystemError, UnknownSkeletonError } from '../errors';
import { SelectionReason, type AnimTrackRebuilderConfigInput } from '../types';
import { SKELETON_CHECKSUM, clip, quietLogger, sample, stream } from './fixtures';
import { createTempDir, type TempDir } from './temp-dir';

let dir: TempDir;

function rebuilder(overrides: Partial<AnimTrackRebuilderConfigInput> = {}): AnimTrackRebuilder {
  const logger = quietLogger();
  return defineConfig(
    { extractDir: path.join(dir.root, 'extract'), outputDir: path.join(dir.root, 'out'), ...overrides },
    { logger, selectionLogger: logger, fileLogger: logger }
  );
}

beforeEach(() => {
  dir = createTempDir();

  dir.writeJson('extract/HUMANS.skeleton.json', {
    checksum: SKELETON_CHECKSUM,
    bones: [
      { name: 'BIP01', parentIndex: -1 },
      { name: 'BIP01 SPINE', parentIndex: 0 },
      { name: 'BIP01 HEAD', parentIndex: 1 }
    ]
  });
  dir.writeJson('extract/anims/HUMANS.script.json', {
    clips: [
      clip('T_WALK_A', 0, 1, { sourceTrack: 'HUM_WALK.ASC' }),
      clip('T_WALK_B', 2, 3, { sourceTrack: 'HUM_WALK.ASC' }),
      clip('T_BAD', 0, 1, { sourceTrack: 'HUM_BAD.ASC' }),
      clip('T_MESH', 0, 1, { sourceTrack: 'HUM_BODY.MDM' })
    ]
  });
  dir.writeJson('extract/anims/T_WALK_A.samples.json', stream());
  dir.writeJson(
    'extract/anims/T_WALK_B.samples.json',
    stream({ frameCount: 1, layer: 2, samples: [sample([20, 20, 20]), sample([21, 21, 21])] })
  );
  dir.writeJson('extract/anims/T_BAD.samples.json', stream({ checksum: 77 }));
  dir.writeText('extract/broken.script.json', '{ "clips": 3 }');
});

afterEach(() => {
  dir.remove();
});

describe('AnimTrackRebuilder', () => {
  it('rebuilds every source track and reports the ones it skipped', async () => {
    const summary = await rebuilder().run();

    expect(summary.scripts).toBe(1);
    expect(summary.failedScripts.map(entry => path.basename(entry.filePath))).toEqual(['broken.script.json']);
    expect(summary.written).toEqual([
      {
        script: 'HUMANS',
        sourceTrack: 'HUM_WALK.ASC',
        reason: SelectionReason.BEST_COMBINATION,
        documentPath: path.join(dir.root, 'out', 'anims', 'HUMANS', 'HUM_WALK.ASC.json')
      }
    ]);
    expect(summary.skipped).toHaveLength(1);
    expect(summary.skipped[0].sourceTrack).toBe('HUM_BAD.ASC');
    expect(summary.skipped[0].error).toBeInstanceOf(UnknownSkeletonError);
  });

  it('writes the merged track document', async () => {
    const [written] = (await rebuilder().run()).written;
    const document = JSON.parse(fs.readFileSync(written.documentPath, 'utf-8'));

    expect(document.hierarchy.bones[2]).toEqual({ index: 2, name: 'BIP01 HEAD', parent_index: 1 });
    expect(document.animation.frame_count).toBe(1);
    expect(document.animation.layer).toBe(2);
    expect(document.animation.source_script.clips.map((entry: { name: string }) => entry.name)).toEqual([
      'T_WALK_A',
      'T_WALK_B'
    ]);
    expect(document.animation.frames['BIP01'].translation).toEqual({ '0': [20, 20, 20], '2': [7, 8, 9] });
    expect(document.animation.frames['BIP01 HEAD'].translation).toEqual({ '1': [21, 21, 21], '3': [10, 11, 12] });
  });

  it('writes a GLB beside the document when asked to', async () => {
    const [written] = (await rebuilder({ exportGlb: true }).run()).written;

    expect(written.glbPath).toBe(path.join(dir.root, 'out', 'anims', 'HUMANS', 'HUM_WALK.ASC.glb'));
    expect(fs.readFileSync(written.glbPath ?? '').subarray(0, 4).toString('latin1')).toBe('glTF');
  });

  it('keeps the documents of scripts sharing a folder and a source track apart', async () => {
    dir.writeJson('extract/anims/MILITIA.script.json', {
      clips: [
        clip('T_WALK_A', 0, 1, { sourceTrack: 'HUM_WALK.ASC' }),
        clip('T_WALK_B', 2, 3, { sourceTrack: 'HUM_WALK.ASC' })
      ]
    });

    const { written } = await rebuilder().run();
    const paths = written.map(entry => entry.documentPath);

    expect(paths).toEqual([
      path.join(dir.root, 'out', 'anims', 'HUMANS', 'HUM_WALK.ASC.json'),
      path.join(dir.root, 'out', 'anims', 'MILITIA', 'HUM_WALK.ASC.json')
    ]);
    expect(paths.filter(filePath => fs.existsSync(filePath))).toHaveLength(2);
  });

  it('skips a track whose document path differs from an earlier one only by case', async () => {
    dir.writeJson('extract/cased/CASED.script.json', {
      clips: [
        clip('T_RUN_UP', 0, 1, { sourceTrack: 'HUM_RUN.ASC' }),
        clip('T_RUN_LOW', 0, 1, { sourceTrack: 'hum_run.asc' })
      ]
    });
    dir.writeJson('extract/cased/T_RUN_UP.samples.json', stream());
    dir.writeJson('extract/cased/T_RUN_LOW.samples.json', stream({ layer: 5 }));

    const summary = await rebuilder().run();

    expect(summary.written.filter(entry => entry.script === 'CASED').map(entry => entry.sourceTrack)).toEqual([
      'HUM_RUN.ASC'
    ]);
    const clash = summary.skipped.find(entry => entry.script === 'CASED');
    expect(clash?.sourceTrack).toBe('hum_run.asc');
    expect(clash?.error).toBeInstanceOf(AnimFileSystemError);
    expect(clash?.error.message).toBe(
      `Output path already written in this run: ${path.join(dir.root, 'out', 'cased', 'CASED', 'hum_run.asc.json')}`
    );

    const kept = JSON.parse(
      fs.readFileSync(path.join(dir.root, 'out', 'cased', 'CASED', 'HUM_RUN.ASC.json'), 'utf-8')
    );
    expect(kept.animation.layer).toBe(1);
  });

  it('clears the output directory when configured', async () => {
    const stale = dir.writeText('out/stale.json', '{}');

    await rebuilder({ cleanOutputDir: true }).run();

    expect(fs.existsSync(stale)).toBe(false);
  });

  it('fails when the extract directory is missing', async () => {
    await expect(rebuilder({ extractDir: path.join(dir.root, 'missing') }).run()).rejects.toThrow(AnimFileSystemError);
  });
});
