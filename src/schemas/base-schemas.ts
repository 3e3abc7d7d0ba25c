/**
 * Base Schemas
 *
 * Common validation schemas shared by the input file schemas.
 */

import { z } from 'zod';

/**
 * Skeleton checksum, an opaque non-negative integer
 */
export const ChecksumSchema = z.number().int().nonnegative();

/**
 * (x, y, z) tuple
 */
export const Vec3Schema = z.tuple([z.number(), z.number(), z.number()]);

/**
 * (x, y, z, w) tuple
 */
export const QuatSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

/**
 * File suffix such as ".asc"
 */
export const ExtensionSchema = z.string().regex(/^\.[^./\\]+$/, 'Extension must start with a dot');
