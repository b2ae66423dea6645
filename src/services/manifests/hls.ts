/**
 * HLS (M3U8) manifest resolver
 *
 * Master playlists yield one format per variant stream plus one audio-only
 * format per alternative audio rendition; a media playlist yields a single
 * format pointing at itself.
 */

import { Parser } from 'm3u8-parser';
import type { NormalizedFormat } from '../extractors/types.js';
import type { ManifestResolver } from './types.js';
import { parseCodecs, parseFrameRate, resolveUrl } from '../../utils/parse.js';
import { getArray, getInt, getString, isRecord, traverse } from '../../utils/traverse.js';

export type M3u8Manifest = Parser['manifest'];

export interface M3u8Options {
  /** Container extension for the produced formats */
  ext?: string;
  /** Download protocol, e.g. `m3u8_native` */
  entryProtocol?: string;
  /** Prefix of every produced `format_id` */
  m3u8Id?: string;
}

export function parseM3u8Manifest(content: string): M3u8Manifest {
  if (!content.trimStart().startsWith('#EXTM3U')) {
    throw new Error('Not an M3U8 playlist');
  }
  const parser = new Parser();
  parser.push(content);
  parser.end();
  return parser.manifest;
}

export function m3u8FormatsFromManifest(
  manifest: M3u8Manifest,
  manifestUrl: string,
  options: M3u8Options = {}
): NormalizedFormat[] {
  const { ext = 'mp4', entryProtocol = 'm3u8_native', m3u8Id = 'hls' } = options;
  const base = {
    manifest_url: manifestUrl,
    ext,
    protocol: entryProtocol,
  };

  const playlists = getArray(manifest, ['playlists']);
  if (playlists.length === 0) {
    // Media playlist: the manifest itself is the stream
    return [{ ...base, format_id: m3u8Id, url: manifestUrl }];
  }

  const formats: NormalizedFormat[] = [];
  const takenIds = new Set<string>();
  const uniqueId = (id: string, suffix: number): string => {
    const formatId = takenIds.has(id) ? `${id}-${suffix}` : id;
    takenIds.add(formatId);
    return formatId;
  };

  // Alternative audio renditions (EXT-X-MEDIA TYPE=AUDIO) with their own playlist
  const audioGroups = traverse(manifest, ['mediaGroups', 'AUDIO']);
  if (isRecord(audioGroups)) {
    for (const [groupId, group] of Object.entries(audioGroups)) {
      if (!isRecord(group)) continue;
      Object.entries(group).forEach(([name, rendition], index) => {
        const uri = getString(rendition, ['uri']);
        if (!uri) return;
        formats.push({
          ...base,
          format_id: uniqueId([m3u8Id, groupId, name].join('-'), index),
          url: resolveUrl(manifestUrl, uri),
          format_note: name,
          language: getString(rendition, ['language']),
          vcodec: 'none',
        });
      });
    }
  }

  playlists.forEach((playlist, index) => {
    const uri = getString(playlist, ['uri']);
    if (!uri) return;

    const bandwidth = getInt(playlist, ['attributes', 'BANDWIDTH']) ?? getInt(playlist, ['attributes', 'AVERAGE-BANDWIDTH']);
    const tbr = bandwidth ? Math.round(bandwidth / 1000) : undefined;
    const codecs = parseCodecs(getString(playlist, ['attributes', 'CODECS']));

    const format: NormalizedFormat = {
      ...base,
      format_id: uniqueId(`${m3u8Id}-${tbr ?? index}`, index),
      url: resolveUrl(manifestUrl, uri),
      ...codecs,
    };
    if (tbr !== undefined) format.tbr = tbr;
    const width = getInt(playlist, ['attributes', 'RESOLUTION', 'width']);
    const height = getInt(playlist, ['attributes', 'RESOLUTION', 'height']);
    if (width !== null) format.width = width;
    if (height !== null) format.height = height;
    const frameRate = traverse(playlist, ['attributes', 'FRAME-RATE']);
    const fps = typeof frameRate === 'number' || typeof frameRate === 'string' ? parseFrameRate(frameRate) : undefined;
    if (fps) format.fps = fps;
    formats.push(format);
  });

  return formats;
}

export const extractM3u8Formats: ManifestResolver<M3u8Options> = async (request, options) => {
  const { http, url, videoId, headers } = request;
  const content = await http.getText(url, videoId, {
    note: 'Downloading m3u8 information',
    headers,
  });
  return m3u8FormatsFromManifest(parseM3u8Manifest(content), url, options);
};
