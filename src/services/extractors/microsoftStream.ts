/**
 * Microsoft Stream Extractor
 *
 * Extracts video metadata from Microsoft Stream (classic) pages through the
 * platform's private REST API.
 *
 * ## How it works:
 * 1. Fetch the video page; the platform title is only served to signed-in users
 * 2. Scrape the bearer token and API gateway URL from the inline page data
 * 3. Fetch the video record from `{gateway}/videos/{id}`
 * 4. Resolve every playback URL (HLS / DASH / Smooth Streaming) into formats
 * 5. Fetch text tracks when subtitles were asked for
 */

import type { HttpClient } from '../http/httpClient.js';
import {
  extractIsmFormats,
  extractM3u8Formats,
  extractMpdFormats,
  type ManifestRequest,
} from '../manifests/index.js';
import { sortFormats } from '../formats/sortFormats.js';
import {
  ExtractionError,
  LoginRequiredError,
  SoftFetchError,
  UnsupportedUrlError,
  errorMessage,
} from '../../utils/errors.js';
import { firstString, getArray, getInt, getString, traverse } from '../../utils/traverse.js';
import {
  decodeBase64Text,
  parseDuration,
  parseIso8601,
  parseResolution,
  urlBasename,
} from '../../utils/parse.js';
import {
  wantsSubtitles,
  type ExtractOptions,
  type InfoExtractor,
  type NormalizedFormat,
  type NormalizedRecord,
  type NormalizedThumbnail,
  type SubtitleMap,
} from './types.js';

// ============ Constants ============

const VALID_URL =
  /^https?:\/\/(?:web|www|msit)\.microsoftstream\.com\/video\/(?<id>[\da-f]{8}-[\da-f]{4}-[\da-f]{4}-[\da-f]{4}-[\da-f]{12})/;

const AUTHENTICATED_TITLE = '<title>Microsoft Stream</title>';
const API_VERSION = '1.4-private';
const VIDEO_EXPAND = 'creator,tokens,status,liveEvent,extensions';
const THUMBNAIL_SIZES = ['extraSmall', 'small', 'medium', 'large'] as const;

// ============ Playback dispatch ============

type PlaybackResolver = (request: ManifestRequest) => Promise<NormalizedFormat[]>;

/**
 * Playback mime type → manifest resolver. Types missing here are ignored so
 * new playback formats on the platform do not break extraction.
 */
const PLAYBACK_RESOLVERS = new Map<string, PlaybackResolver>([
  [
    'application/vnd.apple.mpegurl',
    request => extractM3u8Formats(request, { ext: 'mp4', entryProtocol: 'm3u8_native', m3u8Id: 'hls' }),
  ],
  ['application/dash+xml', request => extractMpdFormats(request, { mpdId: 'dash' })],
  ['application/vnd.ms-sstr+xml', request => extractIsmFormats(request, { ismId: 'mss' })],
]);

// ============ Helpers ============

export function matchVideoId(url: string): string | null {
  return url.match(VALID_URL)?.groups?.id ?? null;
}

export function scrapeField(webpage: string, pattern: RegExp, field: string, videoId: string): string {
  const value = webpage.match(pattern)?.[1]?.trim();
  if (!value) {
    throw new ExtractionError(field, videoId);
  }
  return value;
}

/**
 * Poster URLs end in a base64 segment whose text carries the resolution,
 * e.g. `MTI4MHg3MjAuanBn` → `1280x720.jpg`.
 */
export function thumbnailFromUrl(id: string, url: string): NormalizedThumbnail {
  const thumbnail: NormalizedThumbnail = { id, url };
  const basename = urlBasename(url);
  const decoded = basename ? decodeBase64Text(basename) : null;
  const { width, height } = parseResolution(decoded);
  if (width !== undefined) thumbnail.width = width;
  if (height !== undefined) thumbnail.height = height;
  return thumbnail;
}

export function extractThumbnails(videoData: unknown): NormalizedThumbnail[] {
  const thumbnails: NormalizedThumbnail[] = [];
  for (const size of THUMBNAIL_SIZES) {
    const url = getString(videoData, ['posterImage', size, 'url']);
    if (!url) continue;
    thumbnails.push(thumbnailFromUrl(size, url));
  }
  return thumbnails;
}

/**
 * Split text tracks into human-authored subtitles and automatic captions.
 * Tracks without a language or URL are dropped.
 */
export function partitionTextTracks(tracks: unknown[]): { subtitles: SubtitleMap; automatic_captions: SubtitleMap } {
  const subtitles: SubtitleMap = {};
  const automaticCaptions: SubtitleMap = {};

  for (const track of tracks) {
    const language = getString(track, ['language']);
    const url = getString(track, ['url']);
    if (!language || !url) continue;

    const target = Boolean(traverse(track, ['autoGenerated'])) ? automaticCaptions : subtitles;
    (target[language] ??= []).push({ ext: 'vtt', url });
  }

  return { subtitles, automatic_captions: automaticCaptions };
}

// ============ Main Extractor ============

export class MicrosoftStreamExtractor implements InfoExtractor {
  name = 'microsoftstream';
  description = 'Microsoft Stream';
  priority = 100;

  constructor(private readonly http: HttpClient) {}

  suitable(url: string): boolean {
    return matchVideoId(url) !== null;
  }

  async extract(url: string, options: ExtractOptions = {}): Promise<NormalizedRecord> {
    const urlVideoId = matchVideoId(url);
    if (!urlVideoId) {
      throw new UnsupportedUrlError(url);
    }

    console.log(`[MicrosoftStream] Starting extraction for: ${urlVideoId}`);

    // Step 1: Page fetch & auth check
    const webpage = await this.http.getText(url, urlVideoId);
    if (!webpage.includes(AUTHENTICATED_TITLE)) {
      throw new LoginRequiredError(urlVideoId);
    }

    // Step 2: Credentials embedded in the page data
    const accessToken = scrapeField(webpage, /"AccessToken":"(.+?)"/, 'access token', urlVideoId);
    const apiUrl = scrapeField(webpage, /"ApiGatewayUri":"(.+?)"/, 'api url', urlVideoId).replace(/\/+$/, '');
    const headers = { Authorization: `Bearer ${accessToken}` };

    // Step 3: Video record (fatal)
    const videoData = await this.http.getJson(`${apiUrl}/videos/${urlVideoId}`, urlVideoId, {
      headers,
      query: {
        $expand: VIDEO_EXPAND,
        'api-version': API_VERSION,
      },
    });

    // Step 4: Identifier reconciliation
    const videoId = getString(videoData, ['id']) || urlVideoId;
    const language = getString(videoData, ['language']);

    // Step 5: Thumbnails
    const thumbnails = extractThumbnails(videoData);

    // Step 6: Formats; a language set by the manifest is kept
    const formats = await this.resolveFormats(videoData, videoId, headers);
    for (const format of formats) {
      format.language = format.language || language;
    }
    sortFormats(formats);

    // Step 7: Subtitles, only when asked for
    const textTracks = wantsSubtitles(options)
      ? await this.fetchSubtitles(apiUrl, videoId, headers)
      : {};

    console.log(`[MicrosoftStream] ${videoId}: ${formats.length} formats, ${thumbnails.length} thumbnails`);

    // Step 8: Record assembly
    return {
      id: videoId,
      title: getString(videoData, ['name']),
      description: getString(videoData, ['description']),
      uploader: getString(videoData, ['creator', 'name']),
      uploader_id: firstString(videoData, ['creator', 'mail'], ['creator', 'id']),
      thumbnails,
      ...textTracks,
      timestamp: parseIso8601(traverse(videoData, ['created'])),
      duration: parseDuration(traverse(videoData, ['media', 'duration'])),
      webpage_url: `https://web.microsoftstream.com/video/${videoId}`,
      view_count: getInt(videoData, ['metrics', 'views']),
      like_count: getInt(videoData, ['metrics', 'likes']),
      comment_count: getInt(videoData, ['metrics', 'comments']),
      formats,
    };
  }

  /**
   * Formats of every playback URL. A failing manifest only drops its own formats.
   */
  private async resolveFormats(
    videoData: unknown,
    videoId: string,
    headers: Record<string, string>
  ): Promise<NormalizedFormat[]> {
    const formats: NormalizedFormat[] = [];

    for (const playlist of getArray(videoData, ['playbackUrls'])) {
      const mimeType = getString(playlist, ['mimeType']);
      const playbackUrl = getString(playlist, ['playbackUrl']);
      const resolve = mimeType ? PLAYBACK_RESOLVERS.get(mimeType) : undefined;
      if (!resolve || !playbackUrl) continue;

      try {
        formats.push(...(await resolve({ http: this.http, url: playbackUrl, videoId, headers })));
      } catch (error) {
        const soft = new SoftFetchError(`Failed to resolve ${mimeType} manifest: ${errorMessage(error)}`, videoId, error);
        console.warn(`[MicrosoftStream] ${soft.message}`);
      }
    }

    return formats;
  }

  private async fetchSubtitles(
    apiUrl: string,
    videoId: string,
    headers: Record<string, string>
  ): Promise<{ subtitles: SubtitleMap; automatic_captions: SubtitleMap }> {
    let tracks: unknown[] = [];
    try {
      const response = await this.http.getJson(`${apiUrl}/videos/${videoId}/texttracks`, videoId, {
        note: 'Downloading subtitles JSON',
        headers,
        query: { 'api-version': API_VERSION },
      });
      tracks = getArray(response, ['value']);
    } catch (error) {
      const soft = new SoftFetchError(`Unable to download subtitles: ${errorMessage(error)}`, videoId, error);
      console.warn(`[MicrosoftStream] ${soft.message}`);
    }
    return partitionTextTracks(tracks);
  }
}
