/**
 * Sample Loaders
 *
 * Resolve a clip to its sample stream, either from files on disk or from
 * streams already in memory.
 */

import { FILE_SUFFIXES } from '../constants/config';
import { ClipSampleStreamSchema } from '../schemas';
import type { ClipSampleStream, SampleStreamLoader } from '../types';
import { Logger, findFilesBySuffix, getBasenameWithoutSuffix } from '../utils';
import { readJsonFile } from './json-file';

/**
 * Map clip names to the sample files found below a directory.
 * Clip names match file names case-sensitively; the first file found for a
 * name wins.
 */
export function indexSampleFiles(dirPath: string, logger?: Logger): Map<string, string> {
  const files = new Map<string, string>();
  for (const filePath of findFilesBySuffix(dirPath, FILE_SUFFIXES.SAMPLES)) {
    const clipName = getBasenameWithoutSuffix(filePath, FILE_SUFFIXES.SAMPLES);
    if (files.has(clipName)) {
      logger?.warn(`Duplicate sample file for clip ${clipName}, ignoring ${filePath}`, { filePath });
      continue;
    }
    files.set(clipName, filePath);
  }
  return files;
}

export function loadSampleFile(filePath: string): ClipSampleStream {
  return readJsonFile(filePath, ClipSampleStreamSchema);
}

export function createFileSampleLoader(files: ReadonlyMap<string, string>, logger?: Logger): SampleStreamLoader {
  return clip => {
    const filePath = files.get(clip.name);
    if (!filePath) {
      return undefined;
    }
    const stream = loadSampleFile(filePath);
    logger?.debug(`Loaded samples for clip ${clip.name}`, { filePath, samples: stream.samples.length });
    return stream;
  };
}

export function createInMemorySampleLoader(streams: ReadonlyMap<string, ClipSampleStream>): SampleStreamLoader {
  return clip => streams.get(clip.name);
}
