/**
 * Test Isolation Helpers
 *
 * Mock factories shared by the unit and integration tests.
 */

import { vi } from 'vitest';
import type { Logger, PlatformConfig } from 'homebridge';
import type { HttpRequest, HttpResponse } from '../../src/api/https-client';
import type { OAuthProvider, TokenSet } from '../../src/api/flameconnect-types';

/**
 * Create a mock logger
 */
export function createMockLogger() {
  return {
    prefix: 'FlameConnect',
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    log: vi.fn(),
    success: vi.fn(),
  } satisfies Logger;
}

/**
 * Create a mock platform config
 */
export function createMockConfig(overrides: Partial<PlatformConfig> = {}): PlatformConfig {
  return {
    name: 'Flame Connect',
    platform: 'FlameConnect',
    email: 'user@example.com',
    password: 'test-password',
    updateIntervalInMinutes: 5,
    forceUpdateDelay: 10000,
    ...overrides,
  };
}

export function jsonResponse(statusCode: number, body: unknown, headers: HttpResponse['headers'] = {}): HttpResponse {
  return {
    statusCode,
    body: body === undefined ? '' : JSON.stringify(body),
    headers,
  };
}

/**
 * Transport stub answering requests in order; unexpected calls fail the test
 */
export function queueTransport(...responses: HttpResponse[]) {
  const requests: HttpRequest[] = [];
  const transport = vi.fn(async (request: HttpRequest): Promise<HttpResponse> => {
    requests.push(request);
    const next = responses.shift();
    if (!next) {
      throw new Error(`Unexpected request: ${request.method} ${request.url}`);
    }
    return next;
  });
  return { transport, requests };
}

/**
 * Token provider that always hands out the same placeholder token
 */
export function createMockOAuth(token = 'test-access-token') {
  const tokenSet: TokenSet = { access_token: token, token_type: 'Bearer' };
  return {
    getAccessToken: vi.fn(async () => token),
    isAuthenticated: vi.fn(() => true),
    refreshToken: vi.fn(async () => tokenSet),
  } satisfies OAuthProvider;
}

/**
 * Create a deferred promise for testing async flows
 */
export function createDeferred<T>(): {
    promise: Promise<T>;
    resolve: (value: T) => void;
    reject: (error: Error) => void;
    } {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}
