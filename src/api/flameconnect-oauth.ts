/**
 * Flame Connect OAuth Client
 *
 * Handles OAuth 2.0 authentication against the Flame Connect Azure AD B2C
 * tenant using the mobile app flow (PKCE + credential sign-in).
 * Tokens are persisted to disk and refreshed automatically.
 */

import * as crypto from 'node:crypto';
import {FLAMECONNECT_B2C_CONFIG, OAuthProvider, TokenSet, TokenTrackingProvider} from './flameconnect-types';
import {TokenErrorSchema, TokenSetSchema} from './flameconnect-schemas';
import {HttpTransport, httpsRequest} from './https-client';
import {AuthenticationError, extractAuthorizationCode, loginWithCredentials} from './b2c-login';
import {loadTokenFromFile, saveTokenToFile, deleteTokenFile} from './token-storage';
import {MS_PER_SECOND, OIDC_BASE_SCOPES, TOKEN_EXPIRY_BUFFER_SECONDS} from '../constants';

interface PKCEPair {
    verifier: string;
    challenge: string;
}

export interface B2CClientConfig {
    email: string;
    password: string;
    tokenFilePath: string;
}

const TOKEN_ENDPOINT = `${FLAMECONNECT_B2C_CONFIG.authority}/oauth2/v2.0/token`;
const AUTHORIZE_ENDPOINT = `${FLAMECONNECT_B2C_CONFIG.authority}/oauth2/v2.0/authorize`;
const REQUESTED_SCOPE = [...FLAMECONNECT_B2C_CONFIG.scopes, ...OIDC_BASE_SCOPES].join(' ');

export class FlameConnectOAuth implements TokenTrackingProvider {
    private tokenSet: TokenSet | null = null;
    private refreshPromise: Promise<TokenSet> | null = null;

    constructor(
        private readonly config: B2CClientConfig,
        private readonly onTokenUpdate?: (tokenSet: TokenSet) => void,
        private readonly onError?: (error: Error) => void,
        private readonly transport: HttpTransport = httpsRequest,
    ) {
        this.tokenSet = loadTokenFromFile(
            this.config.tokenFilePath,
            (error) => this.onError?.(new Error(`Failed to load token file: ${error.message}`)),
        );
    }

    /**
     * Build the authorize URL for a PKCE pair and state
     */
    static buildAuthorizeUrl(challenge: string, state: string): string {
        const url = new URL(AUTHORIZE_ENDPOINT);
        url.searchParams.set('client_id', FLAMECONNECT_B2C_CONFIG.clientId);
        url.searchParams.set('response_type', 'code');
        url.searchParams.set('redirect_uri', FLAMECONNECT_B2C_CONFIG.redirectUri);
        url.searchParams.set('scope', REQUESTED_SCOPE);
        url.searchParams.set('code_challenge', challenge);
        url.searchParams.set('code_challenge_method', 'S256');
        url.searchParams.set('state', state);
        return url.toString();
    }

    /**
     * Sign in with email and password and store the resulting tokens
     */
    async authenticate(): Promise<TokenSet> {
        const pkce = this.generatePKCE();
        const state = crypto.randomBytes(16).toString('hex');

        const redirectUrl = await loginWithCredentials(
            this.transport,
            FlameConnectOAuth.buildAuthorizeUrl(pkce.challenge, state),
            this.config.email,
            this.config.password,
        );

        const authorization = extractAuthorizationCode(redirectUrl);
        if (authorization.state !== undefined && authorization.state !== state) {
            throw new AuthenticationError('State mismatch in authorization response');
        }

        const tokenSet = await this.requestToken({
            grant_type: 'authorization_code',
            code: authorization.code,
            redirect_uri: FLAMECONNECT_B2C_CONFIG.redirectUri,
            code_verifier: pkce.verifier,
        });

        this.setTokenSet(tokenSet);
        return tokenSet;
    }

    /**
     * Refresh the access token
     */
    async refreshToken(): Promise<TokenSet> {
        const refreshToken = this.tokenSet?.refresh_token;
        if (!refreshToken) {
            throw new AuthenticationError('No refresh token available');
        }

        // Prevent concurrent refresh requests
        if (this.refreshPromise) {
            return this.refreshPromise;
        }

        this.refreshPromise = this.requestToken({
            grant_type: 'refresh_token',
            refresh_token: refreshToken,
        });

        try {
            const tokenSet = await this.refreshPromise;
            // B2C may omit the refresh token when it has not rotated
            this.setTokenSet({refresh_token: refreshToken, ...tokenSet});
            return tokenSet;
        } finally {
            this.refreshPromise = null;
        }
    }

    /**
     * Get a valid access token, refreshing if necessary
     */
    async getAccessToken(): Promise<string> {
        if (!this.tokenSet) {
            throw new AuthenticationError('Not authenticated. Please authenticate first.');
        }

        const now = Math.floor(Date.now() / MS_PER_SECOND);
        const expiresAt = this.tokenSet.expires_at || 0;

        if (expiresAt < now + TOKEN_EXPIRY_BUFFER_SECONDS) {
            if (!this.tokenSet.refresh_token) {
                throw new AuthenticationError('Token expired and no refresh token available. Please re-authenticate.');
            }
            const refreshed = await this.refreshToken();
            return refreshed.access_token;
        }

        return this.tokenSet.access_token;
    }

    /**
     * Check if we have a token
     */
    isAuthenticated(): boolean {
        return this.tokenSet !== null && !!this.tokenSet.access_token;
    }

    /**
     * Get token expiration date
     */
    getTokenExpiration(): Date | null {
        if (!this.tokenSet?.expires_at) {
            return null;
        }
        return new Date(this.tokenSet.expires_at * MS_PER_SECOND);
    }

    /**
     * Clear stored tokens
     */
    clearTokens(): void {
        this.tokenSet = null;
        try {
            deleteTokenFile(this.config.tokenFilePath);
        } catch (error) {
            this.onError?.(new Error(`Failed to delete token file: ${error instanceof Error ? error.message : String(error)}`));
        }
    }

    // =========================================================================
    // Private methods
    // =========================================================================

    private generatePKCE(): PKCEPair {
        const verifier = crypto.randomBytes(32).toString('base64url');
        const challenge = crypto.createHash('sha256').update(verifier).digest('base64url');
        return {verifier, challenge};
    }

    private async requestToken(grant: Record<string, string>): Promise<TokenSet> {
        const params = new URLSearchParams({
            client_id: FLAMECONNECT_B2C_CONFIG.clientId,
            scope: REQUESTED_SCOPE,
            ...grant,
        });

        const response = await this.transport({
            url: TOKEN_ENDPOINT,
            method: 'POST',
            headers: {
                'Content-Type': 'application/x-www-form-urlencoded',
                'Accept': 'application/json',
            },
            body: params.toString(),
        });

        let body: unknown;
        try {
            body = JSON.parse(response.body);
        } catch {
            throw new AuthenticationError(`Token endpoint returned HTTP ${response.statusCode} with a non-JSON body`);
        }

        const failure = TokenErrorSchema.safeParse(body);
        if (failure.success) {
            throw new AuthenticationError(
                `Token request failed: ${failure.data.error_description || failure.data.error}`,
            );
        }

        const parsed = TokenSetSchema.safeParse(body);
        if (!parsed.success) {
            throw new AuthenticationError(`Token endpoint returned HTTP ${response.statusCode} without a token`);
        }
        return parsed.data;
    }

    private setTokenSet(tokenSet: TokenSet): void {
        const stored: TokenSet = tokenSet.expires_in && !tokenSet.expires_at
            ? {...tokenSet, expires_at: Math.floor(Date.now() / MS_PER_SECOND) + tokenSet.expires_in}
            : tokenSet;

        this.tokenSet = stored;
        try {
            saveTokenToFile(this.config.tokenFilePath, stored);
        } catch (error) {
            this.onError?.(new Error(`Failed to save token file: ${error instanceof Error ? error.message : String(error)}`));
        }

        this.onTokenUpdate?.(stored);
    }
}

/**
 * Provider for a token obtained elsewhere: a fixed string or an async factory.
 * It cannot refresh.
 */
export class StaticTokenProvider implements OAuthProvider {
    constructor(private readonly token: string | (() => Promise<string>)) {}

    async getAccessToken(): Promise<string> {
        return typeof this.token === 'string' ? this.token : this.token();
    }

    isAuthenticated(): boolean {
        return true;
    }

    async refreshToken(): Promise<TokenSet> {
        throw new AuthenticationError('A static token cannot be refreshed');
    }
}
