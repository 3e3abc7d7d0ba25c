/**
 * Animation Constants
 *
 * Constants for clip selection and sample decoding.
 */
export const ANIMATION = {
  /**
   * Playback rate of a clip that has not been sped up or slowed down.
   * Used to break ties between clips with the same frame span.
   */
  REFERENCE_FPS: 25.0,

  /**
   * Speed modifier of a clip played back unmodified.
   */
  UNMODIFIED_SPEED: 0,

  /**
   * Decimal places kept for every decoded sample component.
   */
  SAMPLE_PRECISION: 4,

  /**
   * Parent index marking a root bone in a skeleton file.
   */
  ROOT_PARENT_INDEX: -1,
} as const;

