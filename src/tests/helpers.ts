import request from 'supertest';
import { createApp } from '../app.js';
import { createExtractorRegistry } from '../services/extractors/index.js';
import type { HttpClient, RequestOptions } from '../services/http/httpClient.js';
import { FatalFetchError } from '../utils/errors.js';

// ============ In-process HTTP stand-in ============

export type FakeResponse = { text: string } | { json: unknown } | { status: number };

export interface RecordedRequest {
  url: string;
  videoId: string;
  options: RequestOptions;
}

/**
 * Serves canned responses by exact URL. Unknown URLs fail like a 404.
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: RecordedRequest[] = [];

  constructor(private readonly routes: Record<string, FakeResponse> = {}) {}

  async getText(url: string, videoId: string, options: RequestOptions = {}): Promise<string> {
    const response = this.respond(url, videoId, options);
    return 'text' in response ? response.text : JSON.stringify(response.json);
  }

  async getJson(url: string, videoId: string, options: RequestOptions = {}): Promise<unknown> {
    const response = this.respond(url, videoId, options);
    return 'json' in response ? response.json : JSON.parse(response.text);
  }

  urls(): string[] {
    return this.requests.map(r => r.url);
  }

  private respond(url: string, videoId: string, options: RequestOptions): { text: string } | { json: unknown } {
    this.requests.push({ url, videoId, options });
    const response = this.routes[url] ?? { status: 404 };
    if ('status' in response) {
      throw new FatalFetchError(`Request failed: HTTP Error ${response.status}`, videoId, response.status);
    }
    return response;
  }
}

// ============ Fixtures ============

export const VIDEO_ID = '6e51d928-4f46-4f1c-b141-369925e37b62';
export const PAGE_URL = `https://web.microsoftstream.com/video/${VIDEO_ID}?list=user&userId=f5491e02-e8fe-4e34-b67c-ec2e79a6ecc0`;
export const API_URL = 'https://euno-1.api.microsoftstream.com/api';
export const VIDEO_API_URL = `${API_URL}/videos/${VIDEO_ID}`;
export const TEXT_TRACKS_URL = `${API_URL}/videos/${VIDEO_ID}/texttracks`;

export const HLS_URL = 'https://media.example.com/v1/master.m3u8';
export const DASH_URL = 'https://media.example.com/v1/manifest.mpd';
export const ISM_URL = 'https://media.example.com/v1/manifest.ism/manifest';

export function makeStreamPage(config: Record<string, string> = {
  AccessToken: 'test-token',
  ApiGatewayUri: `${API_URL}/`,
}): string {
  return `<!DOCTYPE html><html><head><title>Microsoft Stream</title></head><body>
<script>window.__config = ${JSON.stringify(config)};</script>
</body></html>`;
}

export const SIGN_IN_PAGE = `<!DOCTYPE html><html><head><title>Sign in to your account</title></head>
<body><form id="login"></form></body></html>`;

export const HLS_MASTER = `#EXTM3U
#EXT-X-VERSION:4
#EXT-X-MEDIA:TYPE=AUDIO,GROUP-ID="aac",NAME="English",LANGUAGE="en",DEFAULT=YES,URI="audio/en.m3u8"
#EXT-X-STREAM-INF:BANDWIDTH=1500000,RESOLUTION=1280x720,CODECS="avc1.64001f,mp4a.40.2",AUDIO="aac"
video/720.m3u8
#EXT-X-STREAM-INF:BANDWIDTH=800000,RESOLUTION=640x360,CODECS="avc1.4d401e,mp4a.40.2",AUDIO="aac"
video/360.m3u8
`;

export const HLS_MEDIA = `#EXTM3U
#EXT-X-VERSION:3
#EXT-X-TARGETDURATION:6
#EXTINF:6.0,
segment0.ts
#EXTINF:4.5,
segment1.ts
#EXT-X-ENDLIST
`;

export const DASH_MPD = `<?xml version="1.0" encoding="UTF-8"?>
<MPD xmlns="urn:mpeg:dash:schema:mpd:2011" type="static" mediaPresentationDuration="PT1H2M3.5S">
  <Period>
    <BaseURL>dash/</BaseURL>
    <AdaptationSet mimeType="video/mp4" contentType="video">
      <Representation id="v1080" bandwidth="4500000" width="1920" height="1080" codecs="avc1.640028" frameRate="30000/1001"/>
      <Representation id="v480" bandwidth="1200000" width="854" height="480" codecs="avc1.4d401f" frameRate="30"/>
    </AdaptationSet>
    <AdaptationSet mimeType="audio/mp4" lang="en">
      <Representation id="a128" bandwidth="128000" codecs="mp4a.40.2" audioSamplingRate="48000"/>
    </AdaptationSet>
    <AdaptationSet mimeType="text/vtt" lang="en">
      <Representation id="t1" bandwidth="100"/>
    </AdaptationSet>
  </Period>
</MPD>
`;

export const ISM_MANIFEST = `<?xml version="1.0" encoding="UTF-8"?>
<SmoothStreamingMedia MajorVersion="2" MinorVersion="2" Duration="37235000000" TimeScale="10000000">
  <StreamIndex Type="video" Name="video" QualityLevels="2" Url="QualityLevels({bitrate})/Fragments(video={start time})">
    <QualityLevel Index="0" Bitrate="2000000" FourCC="AVC1" MaxWidth="1280" MaxHeight="720" CodecPrivateData="000000016764001FAC"/>
    <QualityLevel Index="1" Bitrate="500000" FourCC="WVC1" MaxWidth="640" MaxHeight="360"/>
  </StreamIndex>
  <StreamIndex Type="audio" Name="audio_eng" Language="eng" QualityLevels="1" Url="QualityLevels({bitrate})/Fragments(audio_eng={start time})">
    <QualityLevel Index="0" Bitrate="128000" FourCC="AACL" SamplingRate="48000" Channels="2"/>
  </StreamIndex>
  <StreamIndex Type="text" Name="textstream_eng" Language="eng" QualityLevels="1" Url="QualityLevels({bitrate})/Fragments(textstream_eng={start time})">
    <QualityLevel Index="0" Bitrate="1000" FourCC="TTML"/>
  </StreamIndex>
</SmoothStreamingMedia>
`;

export function makeVideoData(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: VIDEO_ID,
    name: 'Quarterly all-hands',
    description: 'Recording of the Q3 all-hands meeting',
    language: 'en-US',
    created: '2021-02-04T18:30:53.4933333+00:00',
    creator: {
      id: 'creator-1',
      name: 'Test Presenter',
      mail: 'presenter@example.com',
    },
    posterImage: {
      extraSmall: { url: 'https://img.example.com/poster/MTI4MHg3MjAuanBn' },
      medium: { url: 'https://img.example.com/poster/_w' },
      large: { url: 'https://img.example.com/poster/MTkyMHgxMDgw?sv=2020' },
    },
    media: { duration: 'PT1H2M3.5S' },
    metrics: { views: 42, likes: 7, comments: 3 },
    playbackUrls: [
      { mimeType: 'application/vnd.apple.mpegurl', playbackUrl: HLS_URL },
      { mimeType: 'application/dash+xml', playbackUrl: DASH_URL },
      { mimeType: 'application/vnd.ms-sstr+xml', playbackUrl: ISM_URL },
    ],
    ...overrides,
  };
}

export const TEXT_TRACKS = {
  value: [
    { language: 'en', url: 'https://captions.example.com/u1.vtt', autoGenerated: false },
    { language: 'en', url: 'https://captions.example.com/u2.vtt', autoGenerated: true },
    { language: 'fr', url: 'https://captions.example.com/u3.vtt' },
    { language: 'de' },
    { url: 'https://captions.example.com/orphan.vtt' },
  ],
};

export function defaultRoutes(overrides: Record<string, FakeResponse> = {}): Record<string, FakeResponse> {
  return {
    [PAGE_URL]: { text: makeStreamPage() },
    [VIDEO_API_URL]: { json: makeVideoData() },
    [TEXT_TRACKS_URL]: { json: TEXT_TRACKS },
    [HLS_URL]: { text: HLS_MASTER },
    [DASH_URL]: { text: DASH_MPD },
    [ISM_URL]: { text: ISM_MANIFEST },
    ...overrides,
  };
}

export function createTestApp(http: HttpClient = new FakeHttpClient(defaultRoutes())) {
  return createApp({ registry: createExtractorRegistry(http) });
}

export { request };
