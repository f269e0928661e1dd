/**
 * Flame Connect Cloud API Client
 *
 * Handles REST API calls to the Flame Connect cloud.
 */

import {
    FLAMECONNECT_API_BASE,
    FLAMECONNECT_DEFAULT_HEADERS,
    OAuthProvider,
    WriteParametersRequest,
} from './flameconnect-types';
import {
    FireListSchema,
    FireOverviewResponse,
    FireOverviewResponseSchema,
    FireResponse,
    validateData,
} from './flameconnect-schemas';
import {headerValue, HttpResponse, HttpTransport, httpsRequest} from './https-client';
import {
    API_PATHS,
    HTTP_STATUS,
    DEFAULT_RETRY_AFTER_SECONDS,
    MS_PER_SECOND,
    MAX_RATE_LIMIT_BLOCK_SECONDS,
    MAX_RETRY_ATTEMPTS,
    RETRY_BASE_DELAY_MS,
    RETRY_MAX_DELAY_MS,
} from '../constants';

export class ApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number,
        public readonly responseBody: string,
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

export class RateLimitedError extends Error {
    constructor(
        message: string,
        public readonly retryAfter: number,
    ) {
        super(message);
        this.name = 'RateLimitedError';
    }
}

export class ApiTimeoutError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number,
        public readonly attemptsMade: number,
    ) {
        super(message);
        this.name = 'ApiTimeoutError';
    }
}

export class FlameConnectApi {
    private blockedUntil = 0;
    private refreshPromise: Promise<void> | null = null;

    constructor(
        private readonly oauth: OAuthProvider,
        private readonly transport: HttpTransport = httpsRequest,
        private readonly sleep: (ms: number) => Promise<void> = (ms) => new Promise(resolve => setTimeout(resolve, ms)),
    ) {}

    /**
     * Get all fires registered to the account
     */
    async getFires(): Promise<FireResponse[]> {
        const data = await this.request(API_PATHS.GET_FIRES);
        return validateData(FireListSchema, data, 'GetFires');
    }

    /**
     * Get a fire's identity and its base64 parameters
     */
    async getFireOverview(fireId: string): Promise<FireOverviewResponse> {
        const data = await this.request(`${API_PATHS.GET_FIRE_OVERVIEW}?FireId=${encodeURIComponent(fireId)}`);
        return validateData(FireOverviewResponseSchema, data, 'GetFireOverview');
    }

    /**
     * Write encoded parameters to a fire
     */
    async writeWifiParameters(request: WriteParametersRequest): Promise<void> {
        await this.request(API_PATHS.WRITE_WIFI_PARAMETERS, 'POST', request);
    }

    /**
     * Check if we're rate limited
     */
    isRateLimited(): boolean {
        return this.blockedUntil > Date.now();
    }

    /**
     * Get time until rate limit is lifted
     */
    getRateLimitRetryAfter(): number {
        return Math.max(0, Math.ceil((this.blockedUntil - Date.now()) / MS_PER_SECOND));
    }

    /**
     * Calculate delay for exponential backoff with jitter
     */
    private getRetryDelay(attempt: number): number {
        const exponentialDelay = RETRY_BASE_DELAY_MS * Math.pow(2, attempt);
        const jitter = Math.random() * RETRY_BASE_DELAY_MS;
        return Math.min(exponentialDelay + jitter, RETRY_MAX_DELAY_MS);
    }

    /**
     * Get human-readable name for gateway error status codes
     */
    private getGatewayErrorName(statusCode: number): string {
        switch (statusCode) {
            case HTTP_STATUS.BAD_GATEWAY:
                return 'Bad Gateway';
            case HTTP_STATUS.SERVICE_UNAVAILABLE:
                return 'Service Unavailable';
            case HTTP_STATUS.GATEWAY_TIMEOUT:
                return 'Gateway Timeout';
            default:
                return 'Gateway Error';
        }
    }

    /**
     * Make an authenticated API request
     */
    private async request(
        path: string,
        method: 'GET' | 'POST' = 'GET',
        body?: unknown,
        retryCount = 0,
    ): Promise<unknown> {
        if (this.isRateLimited()) {
            const retryAfter = this.getRateLimitRetryAfter();
            throw new RateLimitedError(
                `API request blocked due to rate limit. Retry after ${retryAfter} seconds.`,
                retryAfter,
            );
        }

        const accessToken = await this.oauth.getAccessToken();
        const response = await this.transport({
            url: `${FLAMECONNECT_API_BASE}${path}`,
            method,
            headers: {
                ...FLAMECONNECT_DEFAULT_HEADERS,
                'Authorization': `Bearer ${accessToken}`,
                'Accept': 'application/json',
                ...(body !== undefined && {'Content-Type': 'application/json'}),
            },
            body: body !== undefined ? JSON.stringify(body) : undefined,
        });

        switch (response.statusCode) {
            case HTTP_STATUS.OK:
            case HTTP_STATUS.NO_CONTENT:
                return this.parseBody(response);

            case HTTP_STATUS.UNAUTHORIZED:
                if (retryCount >= MAX_RETRY_ATTEMPTS) {
                    throw new ApiError(
                        `Unauthorized (${HTTP_STATUS.UNAUTHORIZED}): Token expired or invalid`,
                        response.statusCode,
                        response.body,
                    );
                }
                await this.refreshAccessToken();
                await this.sleep(this.getRetryDelay(retryCount));
                return this.request(path, method, body, retryCount + 1);

            case HTTP_STATUS.TOO_MANY_REQUESTS: {
                const retryAfter = this.parseRetryAfter(response) ?? DEFAULT_RETRY_AFTER_SECONDS;
                const blockedFor = Math.min(retryAfter, MAX_RATE_LIMIT_BLOCK_SECONDS);
                this.blockedUntil = Date.now() + blockedFor * MS_PER_SECOND;
                throw new RateLimitedError(
                    `Rate limited. Retry after ${retryAfter} seconds.`,
                    blockedFor,
                );
            }

            case HTTP_STATUS.BAD_GATEWAY:
            case HTTP_STATUS.SERVICE_UNAVAILABLE:
            case HTTP_STATUS.GATEWAY_TIMEOUT: {
                const errorName = this.getGatewayErrorName(response.statusCode);
                if (retryCount >= MAX_RETRY_ATTEMPTS) {
                    throw new ApiTimeoutError(
                        `${errorName} (${response.statusCode}): The Flame Connect API is temporarily unavailable after ${retryCount + 1} attempts.`,
                        response.statusCode,
                        retryCount + 1,
                    );
                }
                await this.sleep(this.getRetryDelay(retryCount));
                return this.request(path, method, body, retryCount + 1);
            }

            default:
                if (response.statusCode >= 200 && response.statusCode < 300) {
                    return this.parseBody(response);
                }
                throw new ApiError(
                    `API error (${response.statusCode}): ${response.body || 'No response body'}`,
                    response.statusCode,
                    response.body,
                );
        }
    }

    /**
     * Refresh the token once for all concurrent 401s
     */
    private async refreshAccessToken(): Promise<void> {
        if (!this.refreshPromise) {
            this.refreshPromise = this.oauth.refreshToken().then(
                () => {
                    this.refreshPromise = null;
                },
                (err: unknown) => {
                    this.refreshPromise = null;
                    throw err;
                },
            );
        }
        try {
            await this.refreshPromise;
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ApiError(
                `Unauthorized (${HTTP_STATUS.UNAUTHORIZED}): Token refresh failed (${reason}). Please re-authenticate.`,
                HTTP_STATUS.UNAUTHORIZED,
                '',
            );
        }
    }

    private parseBody(response: HttpResponse): unknown {
        if (!response.body) {
            return null;
        }
        try {
            return JSON.parse(response.body);
        } catch {
            throw new ApiError(
                `Invalid JSON in response (${response.statusCode})`,
                response.statusCode,
                response.body,
            );
        }
    }

    private parseRetryAfter(response: HttpResponse): number | undefined {
        const value = headerValue(response.headers, 'retry-after');
        if (!value) {
            return undefined;
        }
        const num = parseInt(value, 10);
        return isNaN(num) ? undefined : num;
    }
}
