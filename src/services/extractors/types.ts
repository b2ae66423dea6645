/**
 * Extractor Types
 *
 * Shapes shared by every site extractor: the options an extraction runs
 * with, and the normalized record handed to the downloader/muxer.
 * Record keys keep the downloader's snake_case schema.
 */

// ============ Options ============

/**
 * Caller options consulted during extraction.
 * Text tracks are only requested when at least one flag is set.
 */
export interface ExtractOptions {
  writeSubtitles?: boolean;
  writeAutomaticCaptions?: boolean;
  listSubtitles?: boolean;
}

export function wantsSubtitles(options: ExtractOptions = {}): boolean {
  return Boolean(options.writeSubtitles || options.writeAutomaticCaptions || options.listSubtitles);
}

// ============ Normalized record ============

/**
 * A single playable stream variant
 */
export interface NormalizedFormat {
  format_id: string;
  url: string;
  manifest_url?: string;
  ext?: string;
  protocol?: string;
  width?: number;
  height?: number;
  /** Total bitrate, kbit/s */
  tbr?: number;
  fps?: number;
  vcodec?: string;
  acodec?: string;
  asr?: number;
  audio_channels?: number;
  format_note?: string;
  language?: string | null;
}

export interface NormalizedThumbnail {
  id: string;
  url: string;
  width?: number;
  height?: number;
}

export interface SubtitleEntry {
  ext: string;
  url: string;
}

/** Language code → tracks in source order */
export type SubtitleMap = Record<string, SubtitleEntry[]>;

export interface NormalizedRecord {
  id: string;
  title: string | null;
  description: string | null;
  uploader: string | null;
  uploader_id: string | null;
  thumbnails: NormalizedThumbnail[];
  /** Present only when text tracks were requested */
  subtitles?: SubtitleMap;
  automatic_captions?: SubtitleMap;
  timestamp: number | null;
  duration: number | null;
  webpage_url: string;
  view_count: number | null;
  like_count: number | null;
  comment_count: number | null;
  formats: NormalizedFormat[];
}

// ============ Extractor contract ============

/**
 * Base interface for all site extractors
 */
export interface InfoExtractor {
  /** Unique name of the extractor */
  name: string;

  /** Human readable site name */
  description: string;

  /** Priority (higher = tried first) */
  priority: number;

  /**
   * Check if this extractor handles the URL. Must not touch the network.
   */
  suitable(url: string): boolean;

  /**
   * Extract the normalized record for a URL accepted by `suitable`
   */
  extract(url: string, options?: ExtractOptions): Promise<NormalizedRecord>;
}

/**
 * Outcome of one item in a batch extraction
 */
export type BatchItemResult =
  | { url: string; success: true; record: NormalizedRecord }
  | { url: string; success: false; error: string; statusCode: number };

export interface ExtractorRegistry {
  /**
   * Register an extractor
   */
  register(extractor: InfoExtractor): void;

  /**
   * All registered extractors, highest priority first
   */
  getExtractors(): InfoExtractor[];

  /**
   * First extractor accepting the URL, if any
   */
  findExtractor(url: string): InfoExtractor | undefined;

  /**
   * Extract a single URL; throws for unsupported URLs before any request
   */
  extract(url: string, options?: ExtractOptions): Promise<NormalizedRecord>;

  /**
   * Extract several URLs in order; a failed item does not stop the rest
   */
  extractMany(urls: string[], options?: ExtractOptions): Promise<BatchItemResult[]>;
}
