// ============ Timestamps & durations ============

const ISO8601_RE =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parse an ISO-8601 date/time into integer epoch seconds.
 * Fractional seconds are dropped; a missing offset is taken as UTC.
 */
export function parseIso8601(value: unknown): number | null {
  if (typeof value !== 'string') return null;
  const match = value.trim().match(ISO8601_RE);
  if (!match) return null;

  const [, year, month, day, hour = '0', minute = '0', second = '0', zone] = match;
  let offsetSeconds = 0;
  if (zone && zone !== 'Z') {
    const sign = zone.startsWith('-') ? -1 : 1;
    const digits = zone.slice(1).replace(':', '');
    offsetSeconds = sign * (parseInt(digits.slice(0, 2), 10) * 3600 + parseInt(digits.slice(2), 10) * 60);
  }

  const millis = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second)
  );
  if (Number.isNaN(millis)) return null;
  return Math.floor(millis / 1000) - offsetSeconds;
}

const ISO_DURATION_RE =
  /^P(?:(\d+(?:\.\d+)?)D)?(?:T(?:(\d+(?:\.\d+)?)H)?(?:(\d+(?:\.\d+)?)M)?(?:(\d+(?:\.\d+)?)S)?)?$/i;
const CLOCK_DURATION_RE = /^(?:(?:(\d+):)?(\d{1,2}):)?(\d{1,2}(?:\.\d+)?)$/;

/**
 * Duration in seconds from `PT1H2M3.5S`, `1:02:03.5`, `62:03` or `3723.5`.
 */
export function parseDuration(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const s = value.trim();
  if (!s) return null;

  const iso = s.match(ISO_DURATION_RE);
  if (iso && s.length > 1 && !/T$/i.test(s)) {
    const [, days, hours, minutes, seconds] = iso;
    return (
      Number(days ?? 0) * 86400 +
      Number(hours ?? 0) * 3600 +
      Number(minutes ?? 0) * 60 +
      Number(seconds ?? 0)
    );
  }

  const clock = s.match(CLOCK_DURATION_RE);
  if (clock) {
    const [, hours, minutes, seconds] = clock;
    return Number(hours ?? 0) * 3600 + Number(minutes ?? 0) * 60 + Number(seconds);
  }

  if (/^\d+(?:\.\d+)?$/.test(s)) return Number(s);
  return null;
}

// ============ Resolution & codecs ============

export interface Resolution {
  width?: number;
  height?: number;
}

/**
 * `1920x1080` → width/height, `720p` → height, anything else → `{}`
 */
export function parseResolution(value: string | null | undefined): Resolution {
  if (!value) return {};

  const dims = value.match(/(?<![a-zA-Z0-9])(\d+)\s*[xX×,]\s*(\d+)(?![a-zA-Z0-9])/);
  if (dims) {
    return { width: parseInt(dims[1], 10), height: parseInt(dims[2], 10) };
  }

  const lines = value.match(/(?<![a-zA-Z0-9])(\d+)[pPiI](?![a-zA-Z0-9])/);
  if (lines) {
    return { height: parseInt(lines[1], 10) };
  }

  return {};
}

const VIDEO_CODECS = ['avc1', 'avc3', 'h264', 'hev1', 'hvc1', 'hevc', 'h265', 'vp8', 'vp9', 'vp09', 'av01', 'theora'];
const AUDIO_CODECS = ['mp4a', 'opus', 'vorbis', 'mp3', 'aac', 'ac-3', 'ec-3', 'eac3', 'flac', 'alac'];

export interface Codecs {
  vcodec?: string;
  acodec?: string;
}

/**
 * Split an RFC 6381 `CODECS` attribute into video and audio codecs.
 * A lone codec of unknown kind is reported as the video codec.
 */
export function parseCodecs(value: string | null | undefined): Codecs {
  if (!value) return {};
  const parts = value.split(',').map(c => c.trim()).filter(Boolean);

  let vcodec: string | undefined;
  let acodec: string | undefined;
  const unknown: string[] = [];
  for (const codec of parts) {
    const family = codec.split('.')[0].toLowerCase();
    if (!vcodec && VIDEO_CODECS.includes(family)) vcodec = codec;
    else if (!acodec && AUDIO_CODECS.includes(family)) acodec = codec;
    else unknown.push(codec);
  }

  if (!vcodec && !acodec && unknown.length > 0) {
    return unknown.length === 1 ? { vcodec: unknown[0] } : { vcodec: unknown[0], acodec: unknown[1] };
  }
  if (vcodec && !acodec) return { vcodec, acodec: 'none' };
  if (acodec && !vcodec) return { vcodec: 'none', acodec };
  return { vcodec, acodec };
}

/**
 * Integer XML attribute; absent or non-numeric → undefined
 */
export function parseIntAttr(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = parseInt(value, 10);
  return Number.isNaN(n) ? undefined : n;
}

/** `30000/1001` or `25` → frames per second */
export function parseFrameRate(value: string | number | null | undefined): number | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  const [num, den] = value.split('/').map(Number);
  if (!Number.isFinite(num)) return undefined;
  if (den === undefined) return num;
  return Number.isFinite(den) && den !== 0 ? Math.round((num / den) * 1000) / 1000 : undefined;
}

// ============ URLs & encodings ============

/** Final non-empty path segment of a URL, without query or fragment */
export function urlBasename(url: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }
  const segments = pathname.split('/').filter(Boolean);
  return segments.length > 0 ? segments[segments.length - 1] : null;
}

export function resolveUrl(base: string, relative: string): string {
  try {
    return new URL(relative, base).href;
  } catch {
    return relative;
  }
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode base64 (standard or URL-safe) into UTF-8 text.
 * Padding is added up to a multiple of 4; returns `null` for input that is
 * not base64 or does not decode to valid UTF-8.
 */
export function decodeBase64Text(value: string): string | null {
  const trimmed = value.replace(/=+$/, '');
  if (!trimmed || !/^[A-Za-z0-9+/_-]+$/.test(trimmed) || trimmed.length % 4 === 1) {
    return null;
  }
  const padded = trimmed + '='.repeat((4 - (trimmed.length % 4)) % 4);
  try {
    return utf8.decode(Buffer.from(padded, 'base64'));
  } catch {
    return null;
  }
}
