import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { PlaylistParseError } from '@llhls-edge/common';
import { parsePlaylist } from '../src/parser.js';

export function readFixture(name: string): string {
  return readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), 'utf8');
}

/** Join lines, each terminated with `\n` */
export function playlistText(...lines: string[]): string {
  return lines.map((line) => `${line}\n`).join('');
}

/** Media playlist of equal-length segments */
export function livePlaylist(options: {
  segments: number;
  duration: string;
  targetDuration: number;
  canSkipUntil: string;
}): string {
  const lines = [
    '#EXTM3U',
    `#EXT-X-TARGETDURATION:${options.targetDuration}`,
    `#EXT-X-SERVER-CONTROL:CAN-SKIP-UNTIL=${options.canSkipUntil}`,
    '#EXT-X-MEDIA-SEQUENCE:0',
  ];
  for (let i = 0; i < options.segments; i++) {
    lines.push(`#EXTINF:${options.duration},`, `s${i}.ts`);
  }
  return playlistText(...lines);
}

export function parseFailure(text: string): PlaylistParseError {
  try {
    parsePlaylist(text);
  } catch (error) {
    if (error instanceof PlaylistParseError) return error;
    throw error;
  }
  throw new Error('Expected the playlist to be rejected');
}
