import { describe, it, expect } from 'vitest';
import {
  FakeHttpClient,
  PAGE_URL,
  SIGN_IN_PAGE,
  VIDEO_API_URL,
  VIDEO_ID,
  createTestApp,
  defaultRoutes,
  request,
} from './helpers.js';

describe('Extract API', () => {
  describe('GET /api/extractors', () => {
    it('should list registered extractors', async () => {
      const response = await request(createTestApp())
        .get('/api/extractors')
        .expect(200);

      expect(response.body).toEqual([{ name: 'microsoftstream', description: 'Microsoft Stream' }]);
    });
  });

  describe('GET /api/extract', () => {
    it('should return the normalized record', async () => {
      const response = await request(createTestApp())
        .get('/api/extract')
        .query({ url: PAGE_URL })
        .expect(200);

      expect(response.body.id).toBe(VIDEO_ID);
      expect(response.body.title).toBe('Quarterly all-hands');
      expect(response.body.webpage_url).toBe(`https://web.microsoftstream.com/video/${VIDEO_ID}`);
      expect(response.body.formats).toHaveLength(8);
      expect(response.body).not.toHaveProperty('subtitles');
    });

    it('should include subtitles when asked for', async () => {
      const response = await request(createTestApp())
        .get('/api/extract')
        .query({ url: PAGE_URL, writeAutomaticCaptions: '1' })
        .expect(200);

      expect(response.body.subtitles).toEqual({
        en: [{ ext: 'vtt', url: 'https://captions.example.com/u1.vtt' }],
        fr: [{ ext: 'vtt', url: 'https://captions.example.com/u3.vtt' }],
      });
      expect(response.body.automatic_captions).toEqual({
        en: [{ ext: 'vtt', url: 'https://captions.example.com/u2.vtt' }],
      });
    });

    it('should require a url', async () => {
      const response = await request(createTestApp())
        .get('/api/extract')
        .expect(400);

      expect(typeof response.body.error).toBe('string');
    });

    it('should reject malformed flags', async () => {
      await request(createTestApp())
        .get('/api/extract')
        .query({ url: PAGE_URL, writeSubtitles: 'yes' })
        .expect(400);
    });

    it('should reject unsupported URLs without fetching', async () => {
      const http = new FakeHttpClient(defaultRoutes());
      const response = await request(createTestApp(http))
        .get('/api/extract')
        .query({ url: 'https://vimeo.com/123456' })
        .expect(400);

      expect(response.body).toEqual({ error: 'Unsupported URL: https://vimeo.com/123456' });
      expect(http.requests).toHaveLength(0);
    });

    it('should return 401 when the page is not signed in', async () => {
      const http = new FakeHttpClient(defaultRoutes({ [PAGE_URL]: { text: SIGN_IN_PAGE } }));
      const response = await request(createTestApp(http))
        .get('/api/extract')
        .query({ url: PAGE_URL })
        .expect(401);

      expect(response.body.videoId).toBe(VIDEO_ID);
      expect(response.body.error).toContain('SESSION_COOKIE');
    });

    it('should return 502 when the video API fails', async () => {
      const http = new FakeHttpClient(defaultRoutes({ [VIDEO_API_URL]: { status: 403 } }));
      const response = await request(createTestApp(http))
        .get('/api/extract')
        .query({ url: PAGE_URL })
        .expect(502);

      expect(response.body).toEqual({
        error: `${VIDEO_ID}: Request failed: HTTP Error 403`,
        videoId: VIDEO_ID,
      });
    });
  });

  describe('POST /api/extract/batch', () => {
    it('should report each URL in order', async () => {
      const response = await request(createTestApp())
        .post('/api/extract/batch')
        .send({ urls: [PAGE_URL, 'https://vimeo.com/1'] })
        .expect(200);

      expect(response.body.succeeded).toBe(1);
      expect(response.body.failed).toBe(1);
      expect(response.body.results[0]).toMatchObject({ url: PAGE_URL, success: true, record: { id: VIDEO_ID } });
      expect(response.body.results[1]).toEqual({
        url: 'https://vimeo.com/1',
        success: false,
        error: 'Unsupported URL: https://vimeo.com/1',
        statusCode: 400,
      });
    });

    it('should pass options to every extraction', async () => {
      const response = await request(createTestApp())
        .post('/api/extract/batch')
        .send({ urls: [PAGE_URL], options: { listSubtitles: true } })
        .expect(200);

      expect(Object.keys(response.body.results[0].record.subtitles)).toEqual(['en', 'fr']);
    });

    it('should reject an empty batch', async () => {
      const response = await request(createTestApp())
        .post('/api/extract/batch')
        .send({ urls: [] })
        .expect(400);

      expect(response.body.error).toContain('At least one URL is required');
    });
  });
});
