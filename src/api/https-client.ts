/**
 * HTTPS transport
 *
 * Thin promise wrapper over node:https shared by the API client and the
 * B2C login. Redirects are returned to the caller, never followed.
 */

import * as https from 'node:https';
import {HTTP_REQUEST_TIMEOUT_MS} from '../constants';

export interface HttpRequest {
    url: string;
    method: 'GET' | 'POST';
    headers: Record<string, string>;
    body?: string;
}

export interface HttpResponse {
    statusCode: number;
    body: string;
    headers: Record<string, string | string[] | undefined>;
}

export type HttpTransport = (request: HttpRequest) => Promise<HttpResponse>;

export const httpsRequest: HttpTransport = (request) => {
    return new Promise((resolve, reject) => {
        const urlObj = new URL(request.url);

        const options: https.RequestOptions = {
            hostname: urlObj.hostname,
            port: 443,
            path: urlObj.pathname + urlObj.search,
            method: request.method,
            headers: {
                ...request.headers,
                ...(request.body !== undefined && {
                    'Content-Length': Buffer.byteLength(request.body),
                }),
            },
        };

        const req = https.request(options, (res) => {
            let data = '';
            res.on('data', (chunk) => data += chunk);
            res.on('end', () => resolve({
                statusCode: res.statusCode || 500,
                body: data,
                headers: res.headers,
            }));
        });

        req.setTimeout(HTTP_REQUEST_TIMEOUT_MS, () => {
            req.destroy(new Error(`Request timed out after ${HTTP_REQUEST_TIMEOUT_MS}ms`));
        });

        req.on('error', reject);

        if (request.body !== undefined) {
            req.write(request.body);
        }

        req.end();
    });
};

/**
 * First value of a response header
 */
export function headerValue(headers: HttpResponse['headers'], name: string): string | undefined {
    const value = headers[name.toLowerCase()];
    return Array.isArray(value) ? value[0] : value;
}

/**
 * All values of a response header, e.g. every set-cookie line
 */
export function headerValues(headers: HttpResponse['headers'], name: string): string[] {
    const value = headers[name.toLowerCase()];
    if (value === undefined) {
        return [];
    }
    return Array.isArray(value) ? value : [value];
}
