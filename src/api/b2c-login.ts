/**
 * Azure AD B2C credential sign-in
 *
 * Drives the Flame Connect B2C sign-in pages over plain HTTPS the way the
 * mobile app's web view does, and returns the authorization code the
 * final custom-scheme redirect carries.
 */

import {FLAMECONNECT_B2C_CONFIG} from './flameconnect-types';
import {headerValue, headerValues, HttpResponse, HttpTransport} from './https-client';
import {LOGIN_USER_AGENT, MAX_LOGIN_REDIRECTS} from '../constants';

export class AuthenticationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'AuthenticationError';
    }
}

export interface LoginPageFields {
    csrf: string;
    transId: string;
    policy: string;
    postUrl: string;
    confirmedUrl: string;
}

export interface AuthorizationResult {
    code: string;
    state?: string;
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

// B2C lowercases the policy in redirects; its API endpoints want the original spelling
const B2C_POLICY = FLAMECONNECT_B2C_CONFIG.authority.split('/').pop() ?? '';

const REDIRECT_URI_PREFIX = `${FLAMECONNECT_B2C_CONFIG.redirectUri}?`;

/**
 * The `/{tenant}/{policy}/` prefix of a B2C page URL
 */
export function extractBasePath(pageUrl: string): string {
    const segments = new URL(pageUrl).pathname.split('/').filter(s => s.length > 0);
    if (segments.length >= 2) {
        return `/${segments[0]}/${B2C_POLICY}/`;
    }
    return '/';
}

/**
 * Pull the CSRF token and transaction id out of the sign-in page's SETTINGS object
 */
export function parseLoginPage(html: string, pageUrl: string): LoginPageFields {
    const csrf = html.match(/"csrf"\s*:\s*"([^"]+)"/)?.[1];
    if (!csrf) {
        throw new AuthenticationError('Could not find CSRF token in B2C login page');
    }
    const transId = html.match(/"transId"\s*:\s*"([^"]+)"/)?.[1];
    if (!transId) {
        throw new AuthenticationError('Could not find transId in B2C login page');
    }

    const origin = new URL(pageUrl).origin;
    const base = extractBasePath(pageUrl);

    return {
        csrf,
        transId,
        policy: B2C_POLICY,
        postUrl: `${origin}${base}SelfAsserted?tx=${transId}&p=${B2C_POLICY}`,
        confirmedUrl: `${origin}${base}api/CombinedSigninAndSignup/confirmed`,
    };
}

/**
 * Fold set-cookie lines into the jar; later values replace earlier ones
 */
export function mergeSetCookies(jar: Map<string, string>, setCookies: readonly string[]): void {
    for (const line of setCookies) {
        const pair = line.split(';', 1)[0];
        const separator = pair.indexOf('=');
        if (separator > 0) {
            jar.set(pair.slice(0, separator).trim(), pair.slice(separator + 1));
        }
    }
}

/** Cookie header with values unquoted, as browsers send them */
export function cookieHeader(jar: Map<string, string>): string {
    return [...jar.entries()].map(([name, value]) => `${name}=${value}`).join('; ');
}

/**
 * Read the code (or the B2C error) from the msal redirect URL
 */
export function extractAuthorizationCode(redirectUrl: string): AuthorizationResult {
    const query = redirectUrl.slice(redirectUrl.indexOf('?') + 1);
    const params = new URLSearchParams(query);

    const error = params.get('error');
    if (error) {
        throw new AuthenticationError(`Authorization error: ${params.get('error_description') ?? error}`);
    }

    const code = params.get('code');
    if (!code) {
        throw new AuthenticationError('No authorization code in redirect URL');
    }
    return {code, state: params.get('state') ?? undefined};
}

/**
 * Submit credentials to B2C and return the final custom-scheme redirect URL
 */
export async function loginWithCredentials(
    transport: HttpTransport,
    authorizeUrl: string,
    email: string,
    password: string,
): Promise<string> {
    const jar = new Map<string, string>();

    // Step 1: authorize, following redirects to the sign-in page
    const {response: loginPage, url: pageUrl} = await followRedirects(transport, jar, authorizeUrl);
    if (loginPage.statusCode !== 200) {
        throw new AuthenticationError(`B2C login page returned HTTP ${loginPage.statusCode}`);
    }

    // Step 2: scrape the form fields
    const fields = parseLoginPage(loginPage.body, pageUrl);

    // Step 3: post the credentials
    const form = new URLSearchParams({
        request_type: 'RESPONSE',
        email,
        password,
    });
    const posted = await transport({
        url: fields.postUrl,
        method: 'POST',
        headers: {
            'X-CSRF-TOKEN': fields.csrf,
            'X-Requested-With': 'XMLHttpRequest',
            'Referer': authorizeUrl,
            'Origin': new URL(pageUrl).origin,
            'Accept': 'application/json, text/javascript, */*; q=0.01',
            'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
            'User-Agent': LOGIN_USER_AGENT,
            'Cookie': cookieHeader(jar),
        },
        body: form.toString(),
    });
    if (posted.statusCode !== 200) {
        throw new AuthenticationError(`Credential submission returned HTTP ${posted.statusCode}`);
    }
    if (/"status"\s*:\s*"400"/.test(posted.body)) {
        throw new AuthenticationError('Invalid email or password');
    }
    mergeSetCookies(jar, headerValues(posted.headers, 'set-cookie'));

    // Step 4: confirm, then walk the chain until the msal redirect.
    // csrf and tx are base64 and B2C wants their '=' unescaped.
    const confirmed = `${fields.confirmedUrl}?rememberMe=false&csrf_token=${fields.csrf}`
        + `&tx=${fields.transId}&p=${fields.policy}`;
    return followToAppRedirect(transport, jar, confirmed);
}

async function followRedirects(
    transport: HttpTransport,
    jar: Map<string, string>,
    startUrl: string,
): Promise<{ response: HttpResponse; url: string }> {
    let url = startUrl;
    for (let hop = 0; hop < MAX_LOGIN_REDIRECTS; hop++) {
        const response = await get(transport, jar, url);
        const location = headerValue(response.headers, 'location');
        if (!REDIRECT_STATUSES.has(response.statusCode) || !location) {
            return {response, url};
        }
        url = new URL(location, url).toString();
    }
    throw new AuthenticationError('Too many redirects while loading the B2C login page');
}

async function followToAppRedirect(
    transport: HttpTransport,
    jar: Map<string, string>,
    startUrl: string,
): Promise<string> {
    let url = startUrl;
    for (let hop = 0; hop < MAX_LOGIN_REDIRECTS; hop++) {
        const response = await get(transport, jar, url);

        if (REDIRECT_STATUSES.has(response.statusCode)) {
            const location = headerValue(response.headers, 'location');
            if (!location) {
                throw new AuthenticationError('Redirect without Location header');
            }
            if (location.startsWith(REDIRECT_URI_PREFIX)) {
                return location;
            }
            url = location.startsWith('http') ? location : new URL(location, url).toString();
            continue;
        }

        if (response.statusCode === 200) {
            const match = response.body.match(/(msal[a-f0-9-]+:\/\/auth\?[^\s"'<]+)/);
            if (match) {
                return match[1];
            }
            throw new AuthenticationError('Reached 200 response without finding redirect URL');
        }

        throw new AuthenticationError(`Unexpected HTTP ${response.statusCode} during redirect chain`);
    }
    throw new AuthenticationError('Too many redirects during B2C login');
}

async function get(transport: HttpTransport, jar: Map<string, string>, url: string): Promise<HttpResponse> {
    const headers: Record<string, string> = {
        'User-Agent': LOGIN_USER_AGENT,
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    };
    if (jar.size > 0) {
        headers['Cookie'] = cookieHeader(jar);
    }
    const response = await transport({url, method: 'GET', headers});
    mergeSetCookies(jar, headerValues(response.headers, 'set-cookie'));
    return response;
}
