// E2E tests for the OpenAPI document, health check and fallback routes
import { API_VERSION } from '../../../src/app';
import { TestApp, TestUtils } from '../../helpers/test-utils';

describe('Docs and health E2E Tests', () => {
  let ctx: TestApp;

  afterEach(async () => {
    await ctx.app.close();
  });

  describe('with documentation enabled', () => {
    beforeEach(async () => {
      ctx = await TestUtils.createApp();
    });

    it('describes the transaction routes', async () => {
      const response = await ctx.http().get('/docs/json');

      expect(response.status).toBe(200);
      expect(response.body.openapi).toMatch(/^3\./);
      expect(Object.keys(response.body.paths)).toEqual(expect.arrayContaining([
        '/api/transactions',
        '/api/transactions/{id}',
        '/api/token',
        '/api/token/refresh',
        '/api/auth/register'
      ]));
      expect(Object.keys(response.body.paths['/api/transactions']))
        .toEqual(expect.arrayContaining(['get', 'post']));
      expect(Object.keys(response.body.paths['/api/transactions/{id}']))
        .toEqual(expect.arrayContaining(['get', 'put', 'patch', 'delete']));
      expect(response.body.paths['/api/transactions'].get.security).toEqual([{ bearerAuth: [] }]);
      expect(response.body.components.securitySchemes.bearerAuth).toEqual({
        type: 'http',
        scheme: 'bearer',
        bearerFormat: 'JWT'
      });
    });

    it('serves the ReDoc page for the same document', async () => {
      const response = await ctx.http().get('/redoc');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(response.text).toContain('<redoc spec-url="/docs/json"></redoc>');
    });

    it('reports health', async () => {
      const response = await ctx.http().get('/api/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
      expect(response.body.version).toBe(API_VERSION);
      expect(response.body.services).toEqual({ database: 'healthy' });
    });

    it('answers unknown routes with ROUTE_NOT_FOUND', async () => {
      const response = await ctx.http().get('/api/unknown');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        success: false,
        message: 'Route not found',
        error: 'ROUTE_NOT_FOUND'
      });
    });
  });

  it('hides the documentation when disabled', async () => {
    ctx = await TestUtils.createApp({ ENABLE_SWAGGER: 'false' });

    expect((await ctx.http().get('/docs/json')).status).toBe(404);
    expect((await ctx.http().get('/redoc')).status).toBe(404);
  });

  it('reports an unreachable database as 503', async () => {
    ctx = await TestUtils.createApp({}, async () => false);

    const response = await ctx.http().get('/api/health');

    expect(response.status).toBe(503);
    expect(response.body.status).toBe('unhealthy');
  });
});
