/**
 * Script Index
 *
 * Reads the clips a script declares, in declaration order.
 */

import * as path from 'path';
import { FILE_SUFFIXES } from '../constants/config';
import { ScriptFileSchema } from '../schemas';
import type { Clip } from '../types';
import { findFilesBySuffix, getBasenameWithoutSuffix } from '../utils';
import { readJsonFile } from './json-file';

export interface ScriptEntry {
  name: string;
  filePath: string;
  /**
   * Directory the script's sample files are searched under
   */
  directory: string;
  clips: readonly Clip[];
}

export function findScriptFiles(dirPath: string): string[] {
  return findFilesBySuffix(dirPath, FILE_SUFFIXES.SCRIPT);
}

export function loadScriptFile(filePath: string): ScriptEntry {
  const script = readJsonFile(filePath, ScriptFileSchema);
  return {
    name: script.name ?? getBasenameWithoutSuffix(filePath, FILE_SUFFIXES.SCRIPT),
    filePath,
    directory: path.dirname(filePath),
    clips: script.clips
  };
}
