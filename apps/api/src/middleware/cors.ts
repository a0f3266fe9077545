import type { HttpMiddleware } from '../types/http';

const ALLOWED_METHODS = 'GET, POST, PATCH, OPTIONS';
const ALLOWED_HEADERS = 'Authorization, Content-Type';

/** `allowedOrigin` is '*' or a single origin echoed back when it matches. */
export function corsMiddleware(allowedOrigin: string): HttpMiddleware {
    return async (c, next) => {
        const origin = c.req.header('origin');
        if (allowedOrigin === '*') {
            c.header('Access-Control-Allow-Origin', '*');
        } else if (origin === allowedOrigin) {
            c.header('Access-Control-Allow-Origin', origin);
            c.header('Vary', 'Origin');
        }
        c.header('Access-Control-Allow-Methods', ALLOWED_METHODS);
        c.header('Access-Control-Allow-Headers', ALLOWED_HEADERS);
        c.header('Access-Control-Expose-Headers', 'Content-Type');
        c.header('Access-Control-Max-Age', '86400');

        if (c.req.method === 'OPTIONS') return c.body(null, 204);
        await next();
    };
}
