/**
 * DASH (MPD) manifest resolver
 *
 * One format per Representation of the first Period. Segment addressing is
 * left to the downloader, which receives the manifest URL alongside the
 * representation's resolved BaseURL.
 */

import * as cheerio from 'cheerio';
import type { NormalizedFormat } from '../extractors/types.js';
import type { ManifestResolver } from './types.js';
import { parseCodecs, parseFrameRate, parseIntAttr, resolveUrl } from '../../utils/parse.js';

export interface MpdOptions {
  /** Prefix of every produced `format_id` */
  mpdId?: string;
}

const EXT_BY_MIME: Record<string, string> = {
  'video/mp4': 'mp4',
  'audio/mp4': 'm4a',
  'video/webm': 'webm',
  'audio/webm': 'webm',
};

type ContentKind = 'video' | 'audio' | 'text' | 'unknown';

function contentKind(mimeType: string | undefined, contentType: string | undefined): ContentKind {
  const kind = (contentType ?? mimeType?.split('/')[0] ?? '').toLowerCase();
  if (kind === 'video' || kind === 'audio' || kind === 'text') return kind;
  if (mimeType === 'application/ttml+xml') return 'text';
  return 'unknown';
}

export function mpdFormatsFromXml(xml: string, manifestUrl: string, options: MpdOptions = {}): NormalizedFormat[] {
  const { mpdId = 'dash' } = options;
  const $ = cheerio.load(xml, { xml: true });

  const mpd = $('MPD').first();
  if (mpd.length === 0) {
    throw new Error('Not a DASH manifest');
  }

  const baseUrlOf = (node: typeof mpd, parent: string): string => {
    const text = node.children('BaseURL').first().text().trim();
    return text ? resolveUrl(parent, text) : parent;
  };

  const mpdBase = baseUrlOf(mpd, manifestUrl);
  const period = mpd.children('Period').first();
  const periodBase = baseUrlOf(period, mpdBase);
  const formats: NormalizedFormat[] = [];

  period.children('AdaptationSet').each((_, adaptationEl) => {
    const adaptation = $(adaptationEl);
    const adaptationBase = baseUrlOf(adaptation, periodBase);
    const lang = adaptation.attr('lang') ?? null;

    adaptation.children('Representation').each((index, representationEl) => {
      const representation = $(representationEl);
      const attr = (name: string) => representation.attr(name) ?? adaptation.attr(name);

      const mimeType = attr('mimeType');
      const kind = contentKind(mimeType, adaptation.attr('contentType'));
      if (kind === 'text') return;

      const codecs = attr('codecs');
      const bandwidth = parseIntAttr(representation.attr('bandwidth'));
      const repId = representation.attr('id') ?? String(index);

      const format: NormalizedFormat = {
        format_id: `${mpdId}-${repId}`,
        url: baseUrlOf(representation, adaptationBase),
        manifest_url: manifestUrl,
        ext: (mimeType && EXT_BY_MIME[mimeType]) ?? mimeType?.split('/')[1],
        protocol: 'http_dash_segments',
        language: lang,
      };

      if (kind === 'video') {
        format.vcodec = codecs;
        format.acodec = 'none';
      } else if (kind === 'audio') {
        format.vcodec = 'none';
        format.acodec = codecs;
      } else {
        Object.assign(format, parseCodecs(codecs));
      }

      if (bandwidth !== undefined) format.tbr = bandwidth / 1000;
      const width = parseIntAttr(attr('width'));
      const height = parseIntAttr(attr('height'));
      if (width !== undefined) format.width = width;
      if (height !== undefined) format.height = height;
      const fps = parseFrameRate(attr('frameRate'));
      if (fps !== undefined) format.fps = fps;
      const asr = parseIntAttr(attr('audioSamplingRate'));
      if (asr !== undefined) format.asr = asr;

      formats.push(format);
    });
  });

  return formats;
}

export const extractMpdFormats: ManifestResolver<MpdOptions> = async (request, options) => {
  const { http, url, videoId, headers } = request;
  const xml = await http.getText(url, videoId, {
    note: 'Downloading MPD manifest',
    headers,
  });
  return mpdFormatsFromXml(xml, url, options);
};
