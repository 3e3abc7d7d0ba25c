/**
 * Name Utilities
 *
 * Turns source-track names into file names for the output directory.
 */

const UNSAFE_FILE_NAME_PATTERN = /[\\/:*?"<>|\x00-\x1f]/g;

/**
 * Replaces characters that are not allowed in file names with underscores.
 * Keeps dots, so "HUMANS_WALK.ASC" stays as is.
 */
export function toSafeFileName(name: string): string {
  const sanitized = name.replace(UNSAFE_FILE_NAME_PATTERN, '_').trim();

  if (sanitized.length === 0 || /^\.+$/.test(sanitized)) {
    return 'Unnamed';
  }

  return sanitized;
}
