// src/api/routes/docs.routes.ts
import { FastifyPluginAsync } from 'fastify';

export interface DocsRoutesOptions {
    title: string;
    /** OpenAPI document served by @fastify/swagger-ui. */
    specUrl: string;
}

const REDOC_BUNDLE = 'https://cdn.redoc.ly/redoc/latest/bundles/redoc.standalone.js';

const escapeHtml = (value: string): string =>
    value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

function renderRedocPage(title: string, specUrl: string): string {
    return [
        '<!DOCTYPE html>',
        '<html>',
        '<head>',
        `<title>${escapeHtml(title)}</title>`,
        '<meta charset="utf-8"/>',
        '<meta name="viewport" content="width=device-width, initial-scale=1">',
        '</head>',
        '<body>',
        `<redoc spec-url="${escapeHtml(specUrl)}"></redoc>`,
        `<script src="${REDOC_BUNDLE}"></script>`,
        '</body>',
        '</html>'
    ].join('\n');
}

/**
 * ReDoc view of the same OpenAPI document that Swagger UI shows under /docs.
 */
const docsRoutes: FastifyPluginAsync<DocsRoutesOptions> = async (fastify, options) => {
    const page = renderRedocPage(options.title, options.specUrl);

    fastify.get('/redoc', { schema: { hide: true } }, async (request, reply) => {
        return reply.type('text/html; charset=utf-8').send(page);
    });
};

export default docsRoutes;
