/**
 * Pooled HTTP client shared by the geocoding and forecast requests.
 *
 * One instance per process: created on first use, released once when the run
 * ends. The pipeline receives it as an argument; only the CLI runner touches
 * the process-wide accessors below.
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import http from 'http';
import https from 'https';
import { config, HttpConfig } from '../config.js';
import { logger } from '../logger.js';
import { appError, errorMessage, ok, Result } from '../errors.js';
import { connectTimeoutTransport } from './connect-timeout.js';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

export interface HttpClientOptions {
    http?: HttpConfig;
    /** Replaces the network transport; tests serve responses in-process through it */
    adapter?: AxiosAdapter;
    sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Hide the geocoding key before a URL reaches the logs.
 */
export function redactUrl(url: string): string {
    return url.replace(/([?&]api_key=)[^&]*/g, '$1***');
}

export class HttpClient {
    private client: AxiosInstance;
    private httpAgent: http.Agent;
    private httpsAgent: https.Agent;
    private readonly settings: HttpConfig;
    private readonly sleep: (ms: number) => Promise<void>;
    private closed = false;

    constructor(options: HttpClientOptions = {}) {
        this.settings = options.http ?? config.http;
        this.sleep = options.sleep ?? defaultSleep;

        const agentOptions = {
            keepAlive: true,
            maxSockets: this.settings.maxConnections,
            timeout: this.settings.readTimeoutMs,
        };
        this.httpAgent = new http.Agent(agentOptions);
        this.httpsAgent = new https.Agent({
            ...agentOptions,
            rejectUnauthorized: this.settings.rejectUnauthorized,
        });

        // connect is bounded by the transport, reads by the agent's socket timeout,
        // and the whole request by connect + read
        this.client = axios.create({
            timeout: this.settings.connectTimeoutMs + this.settings.readTimeoutMs,
            transport: connectTimeoutTransport(this.settings.connectTimeoutMs),
            httpAgent: this.httpAgent,
            httpsAgent: this.httpsAgent,
            responseType: 'text',
            transformResponse: [(data: unknown) => data],
            // Status handling happens in fetch() so 5xx can be retried
            validateStatus: () => true,
            ...(options.adapter ? { adapter: options.adapter } : {}),
        });
    }

    isClosed(): boolean {
        return this.closed;
    }

    /**
     * GET a URL and return the body text of a 200 response.
     * 5xx statuses in the retry list are retried with exponential backoff.
     */
    async fetch(url: string, verbose: boolean = false): Promise<Result<string>> {
        if (this.closed) {
            return appError('FetchError', 'Request failed: HTTP client has been released');
        }
        if (verbose) {
            logger.info(`Fetching data from: ${redactUrl(url)}`);
        }

        const { retries, backoffFactor, retryStatuses } = this.settings;

        for (let attempt = 0; ; attempt++) {
            let response: AxiosResponse<unknown>;
            try {
                response = await this.client.get<unknown>(url);
            } catch (error) {
                if (axios.isAxiosError(error) && error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
                    return appError('FetchError', 'Request timed out');
                }
                return appError('FetchError', `Request failed: ${errorMessage(error)}`);
            }

            if (retryStatuses.includes(response.status) && attempt < retries) {
                const delayMs = Math.round(backoffFactor * Math.pow(2, attempt) * 1000);
                logger.debug(`HTTP ${response.status} from ${redactUrl(url)}, retrying in ${delayMs}ms`, {
                    attempt: attempt + 1,
                    retries,
                });
                await this.sleep(delayMs);
                continue;
            }

            if (response.status !== 200) {
                return appError('FetchError', `Failed to fetch data: ${response.status}`);
            }

            const body = response.data;
            return ok(typeof body === 'string' ? body : JSON.stringify(body));
        }
    }

    /**
     * Destroy pooled sockets. Safe to call more than once.
     */
    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.httpAgent.destroy();
        this.httpsAgent.destroy();
    }
}

let sharedClient: HttpClient | null = null;

export function getHttpClient(factory: () => HttpClient = () => new HttpClient()): HttpClient {
    if (!sharedClient) {
        sharedClient = factory();
    }
    return sharedClient;
}

export function releaseHttpClient(): void {
    if (!sharedClient) return;
    const client = sharedClient;
    sharedClient = null;
    client.close();
}

/**
 * Run `fn` with the shared client and release it afterwards, whether `fn`
 * resolves, returns a failed result, or throws.
 */
export async function withHttpClient<T>(
    fn: (client: HttpClient) => Promise<T>,
    factory?: () => HttpClient
): Promise<T> {
    const client = getHttpClient(factory);
    try {
        return await fn(client);
    } finally {
        releaseHttpClient();
    }
}
