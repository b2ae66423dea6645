/**
 * Extractor Registry
 *
 * Central registry for site extractors. Dispatches a URL to the first
 * registered extractor (by priority) that claims it.
 */

import type {
  BatchItemResult,
  ExtractOptions,
  ExtractorRegistry,
  InfoExtractor,
  NormalizedRecord,
} from './types.js';
import type { HttpClient } from '../http/httpClient.js';
import { MicrosoftStreamExtractor } from './microsoftStream.js';
import { AppError, UnsupportedUrlError, errorMessage } from '../../utils/errors.js';

// ============ Registry Implementation ============

class InfoExtractorRegistry implements ExtractorRegistry {
  private extractors: InfoExtractor[] = [];

  /**
   * Register an extractor
   */
  register(extractor: InfoExtractor): void {
    this.extractors.push(extractor);
    // Sort by priority (highest first)
    this.extractors.sort((a, b) => b.priority - a.priority);

    console.log(`[ExtractorRegistry] Registered ${extractor.name}`);
  }

  getExtractors(): InfoExtractor[] {
    return [...this.extractors];
  }

  findExtractor(url: string): InfoExtractor | undefined {
    return this.extractors.find(extractor => extractor.suitable(url));
  }

  /**
   * Unsupported URLs are rejected here, before any extractor runs
   */
  async extract(url: string, options: ExtractOptions = {}): Promise<NormalizedRecord> {
    const extractor = this.findExtractor(url);
    if (!extractor) {
      console.log(`[ExtractorRegistry] No extractor matches: ${url}`);
      throw new UnsupportedUrlError(url);
    }

    console.log(`[ExtractorRegistry] Using extractor: ${extractor.name}`);
    return extractor.extract(url, options);
  }

  async extractMany(urls: string[], options: ExtractOptions = {}): Promise<BatchItemResult[]> {
    const results: BatchItemResult[] = [];

    for (const url of urls) {
      try {
        const record = await this.extract(url, options);
        results.push({ url, success: true, record });
      } catch (error) {
        console.error(`[ExtractorRegistry] ${url} failed:`, errorMessage(error));
        results.push({
          url,
          success: false,
          error: errorMessage(error),
          statusCode: error instanceof AppError ? error.statusCode : 500,
        });
      }
    }

    return results;
  }
}

// ============ Factory ============

/**
 * Registry with the built-in extractors, all sharing one HTTP client
 */
export function createExtractorRegistry(http: HttpClient): ExtractorRegistry {
  const registry = new InfoExtractorRegistry();
  registry.register(new MicrosoftStreamExtractor(http));
  return registry;
}

export { InfoExtractorRegistry, MicrosoftStreamExtractor };

// Re-export types
export * from './types.js';
