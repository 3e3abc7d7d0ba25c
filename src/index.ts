/**
 * Animation track rebuilder
 *
 * Rebuilds full-length skeletal animation tracks from the partial clips a
 * script declares, and merges their samples per bone.
 *
 * @example
 * ```typescript
 * import { defineConfig } from 'anim-track-rebuilder';
 *
 * const rebuilder = defineConfig({
 *   extractDir: './extracted',
 *   outputDir: './output',
 *   exportGlb: true
 * });
 *
 * const summary = await rebuilder.run();
 * ```
 */

import * as path from 'path';
import { FILE_SUFFIXES } from './constants/config';
import { ERROR_MESSAGES } from './constants/errors';
import { parseConfig } from './config';
import { AnimErrorFactory, AnimFileSystemError, isAnimError, type AnimError, type TrackError } from './errors';
import {
  buildTrackDocument,
  createFileSampleLoader,
  exportTrackToGlb,
  findScriptFiles,
  indexSampleFiles,
  loadScriptFile,
  loadSkeletonIndex,
  resetDirectory,
  writeBinaryFile,
  writeTrackDocument,
  type ScriptEntry
} from './io';
import { TrackReconstructor, type ReconstructedTrack } from './reconstruction';
import type { AnimTrackRebuilderConfig, AnimTrackRebuilderConfigInput, SelectionReason, SkeletonIndex } from './types';
import { Logger, LoggerFactory, ensureDirectoryExists, isDirectory, toSafeFileName } from './utils';

export interface WrittenTrack {
  script: string;
  sourceTrack: string;
  reason: SelectionReason;
  documentPath: string;
  glbPath?: string;
}

export interface SkippedTrackSummary {
  script: string;
  sourceTrack: string;
  error: TrackError;
}

export interface FailedScript {
  filePath: string;
  error: AnimError;
}

export interface RebuildSummary {
  scripts: number;
  written: WrittenTrack[];
  skipped: SkippedTrackSummary[];
  failedScripts: FailedScript[];
}

export interface AnimTrackRebuilderOptions {
  logger?: Logger;
  selectionLogger?: Logger;
  fileLogger?: Logger;
}

/**
 * Main rebuilder class
 */
export class AnimTrackRebuilder {
  private readonly config: Readonly<AnimTrackRebuilderConfig>;
  private readonly logger: Logger;
  private readonly selectionLogger: Logger;
  private readonly fileLogger: Logger;

  constructor(config: AnimTrackRebuilderConfigInput, options: AnimTrackRebuilderOptions = {}) {
    this.config = parseConfig(config);
    this.logger = options.logger ?? LoggerFactory.forPipeline(this.config.debug);
    this.selectionLogger = options.selectionLogger ?? LoggerFactory.forSelection(this.config.debug);
    this.fileLogger = options.fileLogger ?? LoggerFactory.forFileOperations(this.config.debug);
    this.logger.logConfig({ ...this.config });
  }

  /**
   * Rebuild every source track of every script below the extract directory.
   *
   * Throws only when the run cannot start: missing extract directory or no
   * skeleton files. Failing scripts and tracks are logged and reported in
   * the summary.
   */
  async run(): Promise<RebuildSummary> {
    return this.logger.withTiming('rebuild', async () => {
      const { extractDir, outputDir } = this.config;

      if (!isDirectory(extractDir)) {
        throw AnimErrorFactory.fileSystemError(
          `${ERROR_MESSAGES.DIRECTORY_NOT_FOUND}: ${extractDir}`,
          extractDir,
          'run'
        );
      }

      const skeletons = loadSkeletonIndex(this.config.hierarchyDir ?? extractDir, this.fileLogger);

      if (this.config.cleanOutputDir) {
        resetDirectory(outputDir, this.fileLogger);
      } else {
        ensureDirectoryExists(outputDir);
      }

      const summary: RebuildSummary = { scripts: 0, written: [], skipped: [], failedScripts: [] };
      const claimedPaths = new Set<string>();
      const scriptFiles = findScriptFiles(extractDir);
      this.logger.logStage('scripts_discovered', { count: scriptFiles.length });

      for (const filePath of scriptFiles) {
        let script: ScriptEntry;
        try {
          script = loadScriptFile(filePath);
        } catch (error) {
          if (!isAnimError(error)) {
            throw error;
          }
          this.logger.logError(error, { filePath, stage: 'load_script' });
          summary.failedScripts.push({ filePath, error });
          continue;
        }

        summary.scripts++;
        await this.rebuildScript(script, skeletons, summary, claimedPaths);
      }

      this.logger.info('Rebuild finished', {
        scripts: summary.scripts,
        written: summary.written.length,
        skipped: summary.skipped.length,
        failedScripts: summary.failedScripts.length
      });
      return summary;
    });
  }

  private async rebuildScript(
    script: ScriptEntry,
    skeletons: SkeletonIndex,
    summary: RebuildSummary,
    claimedPaths: Set<string>
  ): Promise<void> {
    this.logger.logStage('script', { script: script.name, filePath: script.filePath, clips: script.clips.length });

    const reconstructor = new TrackReconstructor({
      options: this.config,
      skeletons,
      loadSampleStream: createFileSampleLoader(indexSampleFiles(script.directory, this.fileLogger), this.fileLogger),
      logger: this.logger,
      selectionLogger: this.selectionLogger
    });

    for (const outcome of reconstructor.reconstructScript(script.name, script.clips)) {
      if (outcome.status === 'skipped') {
        summary.skipped.push({ script: script.name, sourceTrack: outcome.sourceTrack, error: outcome.error });
        continue;
      }

      try {
        summary.written.push(await this.writeOutcome(script, outcome, claimedPaths));
      } catch (error) {
        if (!(error instanceof AnimFileSystemError)) {
          throw error;
        }
        this.logger.logError(error, { script: script.name, sourceTrack: outcome.sourceTrack });
        summary.skipped.push({ script: script.name, sourceTrack: outcome.sourceTrack, error });
      }
    }
  }

  /**
   * Documents go to `outputDir/<script dir>/<script name>/<track>.json`.
   * A path already written in this run, compared case-insensitively, is
   * refused instead of overwritten.
   */
  private async writeOutcome(
    script: ScriptEntry,
    outcome: ReconstructedTrack,
    claimedPaths: Set<string>
  ): Promise<WrittenTrack> {
    const relativeDir = path.relative(this.config.extractDir, script.directory);
    const baseName = toSafeFileName(outcome.sourceTrack);
    const targetDir = path.join(this.config.outputDir, relativeDir, toSafeFileName(script.name));
    const documentPath = path.join(targetDir, `${baseName}${FILE_SUFFIXES.TRACK_DOCUMENT}`);

    const claimKey = documentPath.toLowerCase();
    if (claimedPaths.has(claimKey)) {
      throw AnimErrorFactory.fileSystemError(
        `${ERROR_MESSAGES.OUTPUT_PATH_TAKEN}: ${documentPath}`,
        documentPath,
        'write',
        { script: script.name, sourceTrack: outcome.sourceTrack }
      );
    }
    claimedPaths.add(claimKey);

    const document = buildTrackDocument({
      scriptName: script.name,
      track: outcome.track,
      skeleton: outcome.skeleton,
      selection: outcome.selection,
      mergedClips: outcome.mergedClips,
      precision: this.config.samplePrecision
    });

    writeTrackDocument(documentPath, document, this.fileLogger);

    const written: WrittenTrack = {
      script: script.name,
      sourceTrack: outcome.sourceTrack,
      reason: outcome.selection.reason,
      documentPath
    };

    if (this.config.exportGlb) {
      const glbPath = path.join(targetDir, `${baseName}${FILE_SUFFIXES.GLB}`);
      writeBinaryFile(glbPath, await exportTrackToGlb(outcome.track, outcome.skeleton, this.logger), this.fileLogger);
      written.glbPath = glbPath;
    }

    return written;
  }

  /**
   * Get current configuration
   */
  getConfig(): AnimTrackRebuilderConfig {
    return { ...this.config, sourceTrackExtensions: [...this.config.sourceTrackExtensions] };
  }
}

/**
 * Create rebuilder instance with configuration
 *
 * @example
 * ```typescript
 * const rebuilder = defineConfig({ extractDir: './extracted', debug: true });
 * await rebuilder.run();
 * ```
 */
export function defineConfig(
  config: AnimTrackRebuilderConfigInput,
  options: AnimTrackRebuilderOptions = {}
): AnimTrackRebuilder {
  return new AnimTrackRebuilder(config, options);
}

/**
 * TypeScript type exports
 */
export type {
  AnimTrackRebuilderConfig,
  AnimTrackRebuilderConfigInput,
  ReconstructionOptions,
  Clip,
  RawSample,
  ClipSampleStream,
  SkeletonBone,
  SkeletonRecord,
  SkeletonIndex,
  SkeletonChecksum,
  BoneTrack,
  PerBoneTrack,
  MergedTrack,
  SelectionResult,
  SampleStreamLoader,
  Vec3,
  Quat
} from './types';
export { SelectionReason } from './types';

/**
 * Component exports
 */
export * from './reconstruction';
export * from './io';
export * from './errors';
export { parseConfig, loadConfigFile } from './config';
export { Logger, LogLevel, LoggerFactory, createLogger, roundTo } from './utils';
export { AnimTrackRebuilderConfigSchema, ClipSchema, ClipSampleStreamSchema, SkeletonFileSchema, ScriptFileSchema } from './schemas';
