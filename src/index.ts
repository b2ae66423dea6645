import { createApp } from './app.js';
import { env } from './config/env.js';
import { AxiosHttpClient } from './services/http/httpClient.js';
import { createExtractorRegistry } from './services/extractors/index.js';

function main() {
  const http = new AxiosHttpClient({
    timeoutMs: env.HTTP_TIMEOUT_MS,
    userAgent: env.HTTP_USER_AGENT,
    cookie: env.SESSION_COOKIE,
    cookieDomain: env.SESSION_COOKIE_DOMAIN,
  });
  const app = createApp({ registry: createExtractorRegistry(http) });

  if (!env.SESSION_COOKIE) {
    console.warn('SESSION_COOKIE is not set; sign-in protected videos will fail with 401');
  }

  const server = app.listen(env.PORT, () => {
    console.log(`Server running on http://localhost:${env.PORT}`);
    console.log(`Environment: ${env.NODE_ENV}`);
  });

  const shutdown = () => {
    console.log('\nShutting down gracefully...');
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main();
