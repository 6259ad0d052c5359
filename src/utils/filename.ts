/**
 * Deterministic payload filenames derived from the remote identifier
 */

const UNSAFE_CHARACTER = /[^A-Za-z0-9_-]/g;

// Leaves room for the extension and the temporary suffix
const MAX_NAME_LENGTH = 200;

/**
 * Build "<encoded id>.<extension>" for a remote id
 * Characters outside [A-Za-z0-9_-] become "~" plus four hex digits of their
 * UTF-16 code unit, so distinct ids never share a filename.
 * Returns null for an empty id or one whose encoding is too long
 *
 * @example
 * photoFilename("Dwu85P9SOIk", "jpg") // "Dwu85P9SOIk.jpg"
 * photoFilename("a.b", "jpg") // "a~002eb.jpg"
 */
export function photoFilename(
  remoteId: string,
  extension: string,
): string | null {
  const encoded = remoteId.replace(
    UNSAFE_CHARACTER,
    (char) => `~${char.charCodeAt(0).toString(16).padStart(4, "0")}`,
  );
  if (!encoded || encoded.length > MAX_NAME_LENGTH) return null;
  return `${encoded}.${extension}`;
}

/**
 * Temporary sibling a payload is written to before the atomic rename
 */
export function partialPath(targetPath: string): string {
  return `${targetPath}.part`;
}
