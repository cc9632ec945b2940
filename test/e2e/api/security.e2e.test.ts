// E2E tests for host checking, HTTPS redirect and HSTS
import { TestApp, TestUtils } from '../../helpers/test-utils';

describe('HTTP hardening E2E Tests', () => {
  let ctx: TestApp;

  afterEach(async () => {
    await ctx.app.close();
  });

  describe('allowed hosts', () => {
    beforeEach(async () => {
      ctx = await TestUtils.createApp({ ALLOWED_HOSTS: 'api.example.com, .example.org' });
    });

    it('serves listed hosts with or without a port', async () => {
      expect((await ctx.http().get('/api/health').set('Host', 'api.example.com')).status).toBe(200);
      expect((await ctx.http().get('/api/health').set('Host', 'API.example.com:8080')).status).toBe(200);
    });

    it('serves subdomains of a dotted entry', async () => {
      expect((await ctx.http().get('/api/health').set('Host', 'example.org')).status).toBe(200);
      expect((await ctx.http().get('/api/health').set('Host', 'eu.example.org')).status).toBe(200);
    });

    it('rejects any other host before authentication', async () => {
      const response = await ctx.http().get('/api/transactions').set('Host', 'evil.example.net');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        message: "Invalid HTTP_HOST header: 'evil.example.net'.",
        error: 'DISALLOWED_HOST'
      });
    });
  });

  describe('HTTPS redirect', () => {
    beforeEach(async () => {
      ctx = await TestUtils.createApp({ SECURE_SSL_REDIRECT: 'true' });
    });

    it('redirects plain HTTP to https', async () => {
      const response = await ctx.http().get('/api/health?verbose=1').set('Host', 'api.example.com');

      expect(response.status).toBe(301);
      expect(response.headers.location).toBe('https://api.example.com/api/health?verbose=1');
    });

    it('serves requests a proxy marks as https', async () => {
      const response = await ctx.http().get('/api/health').set('X-Forwarded-Proto', 'https');

      expect(response.status).toBe(200);
    });
  });

  describe('HSTS', () => {
    it('is off outside production by default', async () => {
      ctx = await TestUtils.createApp();

      const response = await ctx.http().get('/api/health');

      expect(response.headers['strict-transport-security']).toBeUndefined();
    });

    it('defaults to one year with subdomains and preload in production', async () => {
      ctx = await TestUtils.createApp({ NODE_ENV: 'production' });

      const response = await ctx.http().get('/api/health');

      expect(response.headers['strict-transport-security']).toBe('max-age=31536000; includeSubDomains; preload');
    });

    it('uses SECURE_HSTS_SECONDS when set', async () => {
      ctx = await TestUtils.createApp({ SECURE_HSTS_SECONDS: '60' });

      const response = await ctx.http().get('/api/health');

      expect(response.headers['strict-transport-security']).toBe('max-age=60');
    });
  });
});
