export { extractM3u8Formats, parseM3u8Manifest, m3u8FormatsFromManifest } from './hls.js';
export type { M3u8Manifest, M3u8Options } from './hls.js';
export { extractMpdFormats, mpdFormatsFromXml } from './dash.js';
export type { MpdOptions } from './dash.js';
export { extractIsmFormats, ismFormatsFromXml } from './ism.js';
export type { IsmOptions } from './ism.js';
export type { ManifestRequest, ManifestResolver } from './types.js';
