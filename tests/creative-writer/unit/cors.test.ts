import { describe, it, expect } from 'vitest';
import { resolveAllowedOrigins } from '../../../src/utils/cors';

describe('resolveAllowedOrigins', () => {
  it('returns local dev origins by default', () => {
    expect(resolveAllowedOrigins({})).toEqual([
      'http://localhost:5173',
      'http://127.0.0.1:5173',
      'http://localhost:3000',
    ]);
  });

  it('puts configured origins first and normalizes them', () => {
    expect(
      resolveAllowedOrigins({
        CORS_ORIGINS: ' https://writer.example.com/ , https://admin.example.com/path',
        WEB_APP_URL: 'https://app.example.com',
      }).slice(0, 3)
    ).toEqual(['https://writer.example.com', 'https://admin.example.com', 'https://app.example.com']);
  });

  it('drops malformed and duplicate entries', () => {
    expect(
      resolveAllowedOrigins({
        CORS_ORIGINS: 'not-a-url,,http://localhost:5173/',
      })
    ).toEqual(['http://localhost:5173', 'http://127.0.0.1:5173', 'http://localhost:3000']);
  });

  it('uses Codespaces forwarded origins when running in a Codespace', () => {
    expect(resolveAllowedOrigins({ CODESPACE_NAME: 'trail-box' })).toEqual([
      'https://trail-box-5173.app.github.dev',
      'https://trail-box-3000.app.github.dev',
      'https://trail-box-1337.app.github.dev',
    ]);
  });

  it('honours a custom forwarding domain', () => {
    expect(
      resolveAllowedOrigins({
        CODESPACE_NAME: 'trail-box',
        GITHUB_CODESPACES_PORT_FORWARDING_DOMAIN: 'preview.example.dev',
      })[0]
    ).toBe('https://trail-box-5173.preview.example.dev');
  });
});
