/**
 * Authentication Constants
 *
 * Constants related to OAuth and the B2C sign-in flow.
 */

/** Buffer time before token expiry to trigger refresh (seconds) */
export const TOKEN_EXPIRY_BUFFER_SECONDS = 10;

/** Redirect hops allowed while following the B2C sign-in chain */
export const MAX_LOGIN_REDIRECTS = 20;

/** Scopes requested alongside the API scope */
export const OIDC_BASE_SCOPES = ['openid', 'offline_access'] as const;

/** Browser user agent presented to the B2C sign-in pages */
export const LOGIN_USER_AGENT =
    'Mozilla/5.0 (Linux; Android 14) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Mobile Safari/537.36';
