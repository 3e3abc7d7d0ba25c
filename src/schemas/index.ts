/**
 * Zod Schemas for the track rebuilder
 *
 * All validation schemas using Zod for type safety and validation.
 */

import { z } from 'zod';
import { ANIMATION } from '../constants/animation';
import { DEFAULT_CONFIG } from '../constants/config';
import { ExtensionSchema } from './base-schemas';

/**
 * Track rebuilder configuration schema
 */
export const AnimTrackRebuilderConfigSchema = z.object({
  debug: z.boolean().optional().default(DEFAULT_CONFIG.DEBUG),
  extractDir: z.string().min(1, 'Extract directory cannot be empty'),
  hierarchyDir: z.string().min(1).optional(),
  outputDir: z.string().min(1, 'Output directory cannot be empty').optional().default(DEFAULT_CONFIG.OUTPUT_DIR),
  cleanOutputDir: z.boolean().optional().default(DEFAULT_CONFIG.CLEAN_OUTPUT_DIR),
  exportGlb: z.boolean().optional().default(DEFAULT_CONFIG.EXPORT_GLB),
  sourceTrackExtensions: z.array(ExtensionSchema).optional().default([...DEFAULT_CONFIG.SOURCE_TRACK_EXTENSIONS]),
  referenceFps: z.number().positive().optional().default(ANIMATION.REFERENCE_FPS),
  samplePrecision: z.number().int().min(0).max(10).optional().default(ANIMATION.SAMPLE_PRECISION),
});

/**
 * Options shared by the reconstruction components
 */
export const ReconstructionOptionsSchema = AnimTrackRebuilderConfigSchema.pick({
  sourceTrackExtensions: true,
  referenceFps: true,
  samplePrecision: true,
});

/**
 * Type exports for TypeScript inference
 */
export type AnimTrackRebuilderConfig = z.infer<typeof AnimTrackRebuilderConfigSchema>;
export type AnimTrackRebuilderConfigInput = z.input<typeof AnimTrackRebuilderConfigSchema>;
export type ReconstructionOptions = z.infer<typeof ReconstructionOptionsSchema>;

// Re-export base schemas
export { ChecksumSchema, Vec3Schema, QuatSchema, ExtensionSchema } from './base-schemas';

// Re-export record schemas
export {
  ClipSchema,
  ScriptFileSchema,
  SkeletonBoneFileSchema,
  SkeletonFileSchema,
  RawSampleSchema,
  ClipSampleStreamSchema,
  type Clip,
  type ScriptFile,
  type SkeletonFile,
  type RawSample,
  type ClipSampleStream,
} from './record-schemas';
