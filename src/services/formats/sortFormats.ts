import type { NormalizedFormat } from '../extractors/types.js';

// Higher is preferred
const PROTOCOL_PREFERENCE: Record<string, number> = {
  https: 4,
  http: 3,
  http_dash_segments: 2,
  m3u8_native: 1,
  m3u8: 1,
  ism: 0,
};

function hasVideo(format: NormalizedFormat): number {
  return format.vcodec === 'none' ? 0 : 1;
}

function hasAudio(format: NormalizedFormat): number {
  return format.acodec === 'none' ? 0 : 1;
}

function sortKey(format: NormalizedFormat): number[] {
  return [
    hasVideo(format),
    hasAudio(format),
    format.height ?? -1,
    format.width ?? -1,
    format.tbr ?? -1,
    format.fps ?? -1,
    PROTOCOL_PREFERENCE[format.protocol ?? ''] ?? -1,
  ];
}

export function compareFormats(a: NormalizedFormat, b: NormalizedFormat): number {
  const ka = sortKey(a);
  const kb = sortKey(b);
  for (let i = 0; i < ka.length; i++) {
    if (ka[i] !== kb[i]) return ka[i] - kb[i];
  }
  return a.format_id.localeCompare(b.format_id);
}

/**
 * Sort formats in place from worst to best; the last entry is the preferred one.
 */
export function sortFormats(formats: NormalizedFormat[]): NormalizedFormat[] {
  return formats.sort(compareFormats);
}
