/**
 * Smooth Streaming (ISM) manifest resolver
 */

import * as cheerio from 'cheerio';
import type { NormalizedFormat } from '../extractors/types.js';
import type { ManifestResolver } from './types.js';
import { parseIntAttr } from '../../utils/parse.js';

export interface IsmOptions {
  /** Prefix of every produced `format_id` */
  ismId?: string;
}

const SUPPORTED_FOURCC = ['AVC1', 'H264', 'AACL', 'EC-3'];

const CODEC_BY_FOURCC: Record<string, string> = {
  AVC1: 'avc1',
  H264: 'avc1',
  AACL: 'mp4a.40.2',
  'EC-3': 'ec-3',
};

export function ismFormatsFromXml(xml: string, manifestUrl: string, options: IsmOptions = {}): NormalizedFormat[] {
  const { ismId = 'mss' } = options;
  const $ = cheerio.load(xml, { xml: true });

  const root = $('SmoothStreamingMedia').first();
  if (root.length === 0) {
    throw new Error('Not a Smooth Streaming manifest');
  }
  if (root.children('Protection').length > 0) {
    throw new Error('Smooth Streaming manifest is DRM protected');
  }

  const formats: NormalizedFormat[] = [];

  root.children('StreamIndex').each((_, streamEl) => {
    const stream = $(streamEl);
    const type = stream.attr('Type');
    if (type !== 'video' && type !== 'audio') return;

    const streamName = stream.attr('Name');
    const language = stream.attr('Language') ?? null;

    stream.children('QualityLevel').each((__, levelEl) => {
      const level = $(levelEl);
      const fourcc = (level.attr('FourCC') ?? (type === 'audio' ? 'AACL' : '')).toUpperCase();
      if (!SUPPORTED_FOURCC.includes(fourcc)) {
        console.log(`[ISM] Skipping unsupported FourCC ${fourcc || '(none)'}`);
        return;
      }

      const bitrate = parseIntAttr(level.attr('Bitrate'));
      const tbr = bitrate !== undefined ? Math.floor(bitrate / 1000) : undefined;
      const format: NormalizedFormat = {
        format_id: [ismId, streamName, tbr].filter(part => part !== undefined && part !== '').join('-'),
        url: manifestUrl,
        manifest_url: manifestUrl,
        ext: type === 'video' ? 'ismv' : 'isma',
        protocol: 'ism',
        language,
        vcodec: type === 'video' ? CODEC_BY_FOURCC[fourcc] : 'none',
        acodec: type === 'audio' ? CODEC_BY_FOURCC[fourcc] : 'none',
      };
      if (tbr !== undefined) format.tbr = tbr;

      if (type === 'video') {
        const width = parseIntAttr(level.attr('MaxWidth'));
        const height = parseIntAttr(level.attr('MaxHeight'));
        if (width !== undefined) format.width = width;
        if (height !== undefined) format.height = height;
      } else {
        const asr = parseIntAttr(level.attr('SamplingRate'));
        const channels = parseIntAttr(level.attr('Channels'));
        if (asr !== undefined) format.asr = asr;
        if (channels !== undefined) format.audio_channels = channels;
      }

      formats.push(format);
    });
  });

  return formats;
}

export const extractIsmFormats: ManifestResolver<IsmOptions> = async (request, options) => {
  const { http, url, videoId, headers } = request;
  const xml = await http.getText(url, videoId, {
    note: 'Downloading ISM manifest',
    headers,
  });
  return ismFormatsFromXml(xml, url, options);
};
