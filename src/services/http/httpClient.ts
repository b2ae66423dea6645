/**
 * Outbound HTTP for extractors.
 *
 * Every failure (transport or non-2xx) surfaces as a `FatalFetchError`;
 * callers that can live without a response catch it themselves.
 */

import axios, { isAxiosError, type AxiosInstance } from 'axios';
import { FatalFetchError, errorMessage } from '../../utils/errors.js';

export interface RequestOptions {
  headers?: Record<string, string>;
  query?: Record<string, string>;
  /** Shown in the log line for this request */
  note?: string;
}

export interface HttpClient {
  getText(url: string, videoId: string, options?: RequestOptions): Promise<string>;
  getJson(url: string, videoId: string, options?: RequestOptions): Promise<unknown>;
}

export interface AxiosHttpClientOptions {
  timeoutMs?: number;
  userAgent?: string;
  /** Session cookie header, sent only to hosts under `cookieDomain` */
  cookie?: string;
  /** Registrable domain the session cookie belongs to */
  cookieDomain?: string;
  /** Pre-built instance; tests pass one with a stub adapter */
  instance?: AxiosInstance;
}

export class AxiosHttpClient implements HttpClient {
  private readonly client: AxiosInstance;
  private readonly cookie?: string;
  private readonly cookieDomain: string;

  constructor(options: AxiosHttpClientOptions = {}) {
    this.client = options.instance ?? axios.create();
    this.client.defaults.timeout = options.timeoutMs ?? 20000;
    if (options.userAgent) {
      this.client.defaults.headers.common['User-Agent'] = options.userAgent;
    }
    this.cookie = options.cookie;
    this.cookieDomain = (options.cookieDomain ?? 'microsoftstream.com').replace(/^\./, '').toLowerCase();
  }

  async getText(url: string, videoId: string, options: RequestOptions = {}): Promise<string> {
    const data = await this.request(url, videoId, 'text', options.note ?? 'Downloading webpage', options);
    return typeof data === 'string' ? data : JSON.stringify(data);
  }

  async getJson(url: string, videoId: string, options: RequestOptions = {}): Promise<unknown> {
    const data = await this.request(url, videoId, 'json', options.note ?? 'Downloading JSON metadata', options);
    if (typeof data !== 'string') return data;
    try {
      return JSON.parse(data);
    } catch (error) {
      throw new FatalFetchError(`Failed to parse JSON from ${url}: ${errorMessage(error)}`, videoId);
    }
  }

  /**
   * Cookie header for `url`, like a jar holding one cookie scoped to `cookieDomain`
   */
  private cookieHeader(url: string): Record<string, string> {
    if (!this.cookie) return {};
    let hostname: string;
    try {
      hostname = new URL(url).hostname.toLowerCase();
    } catch {
      return {};
    }
    const inDomain = hostname === this.cookieDomain || hostname.endsWith(`.${this.cookieDomain}`);
    return inDomain ? { Cookie: this.cookie } : {};
  }

  private async request(
    url: string,
    videoId: string,
    responseType: 'text' | 'json',
    note: string,
    options: RequestOptions
  ): Promise<unknown> {
    console.log(`[HttpClient] ${videoId}: ${note}`);
    try {
      const response = await this.client.get<unknown>(url, {
        headers: { ...this.cookieHeader(url), ...options.headers },
        params: options.query,
        responseType,
      });
      return response.data;
    } catch (error) {
      if (isAxiosError(error)) {
        const status = error.response?.status;
        const reason = status ? `HTTP Error ${status}` : error.message;
        throw new FatalFetchError(`${note} failed: ${reason}`, videoId, status);
      }
      throw new FatalFetchError(`${note} failed: ${errorMessage(error)}`, videoId);
    }
  }
}
