/**
 * Record Schemas
 *
 * Schemas for the clip, skeleton and sample files the input collaborators read.
 */

import { z } from 'zod';
import { ChecksumSchema, QuatSchema, Vec3Schema } from './base-schemas';

/**
 * One clip declared by a script
 */
export const ClipSchema = z
  .object({
    name: z.string().min(1, 'Clip name cannot be empty'),
    sourceTrack: z.string().min(1, 'Source track cannot be empty'),
    firstFrame: z.number().int(),
    lastFrame: z.number().int(),
    fps: z.number().nonnegative(),
    speedModifier: z.number(),
  })
  .readonly();

/**
 * Script file: the clips a script declares, in declaration order
 */
export const ScriptFileSchema = z.object({
  name: z.string().min(1).optional(),
  clips: z.array(ClipSchema),
});

/**
 * Bone entry of a skeleton file. The bone index is its position in the list.
 */
export const SkeletonBoneFileSchema = z.object({
  name: z.string().min(1, 'Bone name cannot be empty'),
  parentIndex: z.number().int().min(-1).optional(),
});

/**
 * Skeleton hierarchy file
 */
export const SkeletonFileSchema = z.object({
  checksum: ChecksumSchema,
  bones: z.array(SkeletonBoneFileSchema),
});

/**
 * One flat sample of a clip
 */
export const RawSampleSchema = z
  .object({
    position: Vec3Schema,
    rotation: QuatSchema,
  })
  .readonly();

/**
 * Sample stream file of a single clip
 */
export const ClipSampleStreamSchema = z
  .object({
    checksum: ChecksumSchema,
    frameCount: z.number().int().nonnegative(),
    fps: z.number().nonnegative(),
    fpsSource: z.number().nonnegative(),
    layer: z.number().int(),
    boneIndexCycle: z.array(z.number().int().nonnegative()).readonly(),
    samples: z.array(RawSampleSchema).readonly(),
  })
  .readonly();

export type Clip = z.infer<typeof ClipSchema>;
export type ScriptFile = z.infer<typeof ScriptFileSchema>;
export type SkeletonFile = z.infer<typeof SkeletonFileSchema>;
export type RawSample = z.infer<typeof RawSampleSchema>;
export type ClipSampleStream = z.infer<typeof ClipSampleStreamSchema>;
