/**
 * Command line runner
 *
 * Reads the configuration file (./config.json by default), rebuilds every
 * source track below the configured extract directory and returns a non-zero
 * exit code when the run could not start.
 */

import { DEFAULT_CONFIG } from '../constants/config';
import { loadConfigFile } from '../config';
import { isAnimError } from '../errors';
import { AnimTrackRebuilder, type RebuildSummary } from '../index';
import { LoggerFactory } from '../utils';

export const logger = LoggerFactory.forPipeline();

function printSummary(summary: RebuildSummary): void {
  console.log(`Scripts processed: ${summary.scripts}`);
  console.log(`Tracks written:    ${summary.written.length}`);
  for (const track of summary.written) {
    console.log(`  ${track.sourceTrack} (${track.reason}) -> ${track.documentPath}`);
  }
  if (summary.skipped.length > 0) {
    console.log(`Tracks skipped:    ${summary.skipped.length}`);
    for (const track of summary.skipped) {
      console.log(`  ${track.script}/${track.sourceTrack}: ${track.error.message}`);
    }
  }
  if (summary.failedScripts.length > 0) {
    console.log(`Scripts failed:    ${summary.failedScripts.length}`);
    for (const script of summary.failedScripts) {
      console.log(`  ${script.filePath}: ${script.error.message}`);
    }
  }
}

export async function main(argv: string[]): Promise<number> {
  const configPath = argv[0] ?? DEFAULT_CONFIG.CONFIG_FILE;

  try {
    const config = loadConfigFile(configPath);
    const summary = await new AnimTrackRebuilder(config).run();
    printSummary(summary);
    return 0;
  } catch (error) {
    if (isAnimError(error)) {
      logger.error(`ERROR: ${error.message}`, { details: error.getDetails() });
      return 1;
    }
    throw error;
  }
}
