import type { HttpClient } from '../http/httpClient.js';
import type { NormalizedFormat } from '../extractors/types.js';

export interface ManifestRequest {
  http: HttpClient;
  /** Manifest URL */
  url: string;
  /** Correlation id for logs and errors */
  videoId: string;
  /** Sent with the manifest request */
  headers?: Record<string, string>;
}

export type ManifestResolver<TOptions = Record<string, never>> = (
  request: ManifestRequest,
  options: TOptions
) => Promise<NormalizedFormat[]>;
