import { KEY_PREFIX_LEN } from '../constants';
import { hashKey } from '../domain/api-keys';
import type { HttpApp, HttpContext, HttpMiddleware } from '../types/http';

function readBearerToken(c: HttpContext): string | null {
    const authorization = c.req.header('authorization');
    if (!authorization) return null;

    const [scheme, token] = authorization.split(' ');
    if (!scheme || !token || scheme.toLowerCase() !== 'bearer') return null;
    return token;
}

function unauthorized(c: HttpContext) {
    c.header('WWW-Authenticate', 'Bearer');
    return c.json({ error: 'Unauthorized' }, 401);
}

function bearerAuthMiddleware(verify: (token: string, c: HttpContext) => Promise<boolean>): HttpMiddleware {
    return async (c, next) => {
        const token = readBearerToken(c);
        if (!token) return unauthorized(c);

        const ok = await verify(token, c);
        if (!ok) return unauthorized(c);

        await next();
    };
}

async function verifyToken(token: string, c: HttpContext) {
    const prefix = token.slice(0, KEY_PREFIX_LEN);
    const hash = await hashKey(token);

    const tokenRow = await c.get('storage').findApiKeyByPrefix(prefix);
    if (!tokenRow || hash !== tokenRow.key_hash) return false;

    c.set('auth', { apiKeyId: tokenRow.id, accountId: tokenRow.account_id });
    return true;
}

async function verifyAdminToken(token: string, c: HttpContext) {
    const expected = c.get('config').THREADKEEP_ADMIN_KEY;
    if (!expected) return false;
    return token === expected;
}

export function registerAuthMiddleware(app: HttpApp) {
    const accountAuth = bearerAuthMiddleware(verifyToken);
    for (const path of ['/sessions', '/sessions/*', '/credits', '/credits/*']) {
        app.use(path, accountAuth);
    }
    app.use('/v1/*', bearerAuthMiddleware(verifyAdminToken));
}
