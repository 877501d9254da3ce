import type { StrapiConfigContext } from '../src/types/strapi';
import { resolveAllowedOrigins } from '../src/utils/cors';

export default ({ env }: StrapiConfigContext) => [
  'strapi::logger',
  'strapi::errors',
  {
    name: 'strapi::security',
    config: {
      contentSecurityPolicy: {
        useDefaults: true,
        directives: {
          'connect-src': ["'self'", 'https:'],
          'img-src': ["'self'", 'data:', 'blob:', 'market-assets.strapi.io'],
          'media-src': ["'self'", 'data:', 'blob:', 'market-assets.strapi.io'],
          upgradeInsecureRequests: null,
        },
      },
    },
  },
  {
    name: 'strapi::cors',
    config: {
      origin: resolveAllowedOrigins({
        CORS_ORIGINS: env('CORS_ORIGINS'),
        WEB_APP_URL: env('WEB_APP_URL'),
        CODESPACE_NAME: env('CODESPACE_NAME'),
        GITHUB_CODESPACES_PORT_FORWARDING_DOMAIN: env('GITHUB_CODESPACES_PORT_FORWARDING_DOMAIN'),
      }),
      methods: ['GET', 'POST', 'OPTIONS'],
      headers: ['Content-Type', 'Authorization', 'Accept', 'X-Correlation-Id'],
      expose: ['X-Correlation-Id'],
    },
  },
  'strapi::poweredBy',
  'strapi::query',
  'strapi::body',
  'strapi::session',
  'strapi::favicon',
  'strapi::public',
];
