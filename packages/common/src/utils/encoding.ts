/**
 * Playlist byte handling
 */

const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const encoder = new TextEncoder();

/**
 * Decode playlist bytes as UTF-8, keeping a byte order mark in the text.
 * @returns The text, or null when the bytes are not valid UTF-8
 */
export function decodePlaylist(bytes: Uint8Array): string | null {
  try {
    return decoder.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) {
      return null;
    }
    throw error;
  }
}

/** UTF-8 bytes of a rendered playlist */
export function encodePlaylist(text: string): Uint8Array {
  return encoder.encode(text);
}
