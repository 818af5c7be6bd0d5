/**
 * HTTP client test suite
 *
 * - Status handling and body passthrough
 * - Retry with exponential backoff on 5xx
 * - Timeout and transport failures
 * - Process-wide instance lifecycle
 */

import { EventEmitter } from 'events';
import { describe, it, expect, afterEach, beforeEach, jest } from '@jest/globals';
import { AxiosError, InternalAxiosRequestConfig } from 'axios';
import {
    HttpClient,
    getHttpClient,
    redactUrl,
    releaseHttpClient,
    withHttpClient,
} from '../http/http-client.js';
import { logger } from '../logger.js';
import { connectTimeoutTransport } from '../http/connect-timeout.js';
import { createMockServer, createTestClient, timeoutError, MockReply, TEST_HTTP_CONFIG } from './mock-http.js';

jest.mock('../logger.js', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

const RESOURCE_URL = 'https://api.example.test/v1/resource';

function sequence(replies: MockReply[]): (url: string) => MockReply {
    let index = 0;
    return () => replies[Math.min(index++, replies.length - 1)];
}

describe('HttpClient.fetch', () => {
    it('returns the body of a 200 response', async () => {
        const server = createMockServer(() => ({ status: 200, body: '{"hello":"world"}' }));
        const result = await createTestClient(server).fetch(RESOURCE_URL);
        expect(result).toEqual({ ok: true, data: '{"hello":"world"}' });
        expect(server.requests).toEqual([RESOURCE_URL]);
    });

    it('fails with the status code on a non-200 response', async () => {
        const server = createMockServer(() => ({ status: 404, body: 'not found' }));
        const result = await createTestClient(server).fetch(RESOURCE_URL);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe('FetchError');
        expect(result.error.message).toBe('Failed to fetch data: 404');
        expect(server.requests).toHaveLength(1);
    });

    it('retries a 503 and returns the later success', async () => {
        const sleep = jest.fn(async (_ms: number) => {});
        const server = createMockServer(sequence([
            { status: 503, body: '' },
            { status: 200, body: 'ok' },
        ]));
        const result = await createTestClient(server, sleep).fetch(RESOURCE_URL);
        expect(result).toEqual({ ok: true, data: 'ok' });
        expect(server.requests).toHaveLength(2);
        expect(sleep).toHaveBeenCalledTimes(1);
        expect(sleep).toHaveBeenCalledWith(300);
    });

    it('gives up after three retries with doubling delays', async () => {
        const sleep = jest.fn(async (_ms: number) => {});
        const server = createMockServer(() => ({ status: 502, body: '' }));
        const result = await createTestClient(server, sleep).fetch(RESOURCE_URL);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.message).toBe('Failed to fetch data: 502');
        expect(server.requests).toHaveLength(4);
        expect(sleep.mock.calls.map(call => call[0])).toEqual([300, 600, 1200]);
    });

    it('does not retry statuses outside the retry list', async () => {
        const sleep = jest.fn(async (_ms: number) => {});
        const server = createMockServer(() => ({ status: 501, body: '' }));
        const result = await createTestClient(server, sleep).fetch(RESOURCE_URL);
        expect(result.ok).toBe(false);
        expect(server.requests).toHaveLength(1);
        expect(sleep).not.toHaveBeenCalled();
    });

    it('reports timeouts', async () => {
        const server = createMockServer(() => ({ error: timeoutError() }));
        const result = await createTestClient(server).fetch(RESOURCE_URL);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe('FetchError');
        expect(result.error.message).toBe('Request timed out');
    });

    it('reports a connect timeout from the transport as a timeout', async () => {
        const server = createMockServer(() => ({
            error: new AxiosError('connect timeout after 2000ms', 'ETIMEDOUT'),
        }));
        const result = await createTestClient(server).fetch(RESOURCE_URL);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.message).toBe('Request timed out');
        expect(server.requests).toHaveLength(1);
    });

    it('sends requests through the connect-timeout transport with a connect + read deadline', async () => {
        const seen: InternalAxiosRequestConfig[] = [];
        const client = new HttpClient({
            http: TEST_HTTP_CONFIG,
            adapter: async requestConfig => {
                seen.push(requestConfig);
                return { data: 'ok', status: 200, statusText: '', headers: {}, config: requestConfig };
            },
        });
        await client.fetch(RESOURCE_URL);
        expect(seen).toHaveLength(1);
        expect(seen[0].timeout).toBe(7000);
        expect(typeof seen[0].transport.request).toBe('function');
    });

    it('reports transport errors with their cause', async () => {
        const server = createMockServer(() => ({ error: new Error('socket hang up') }));
        const result = await createTestClient(server).fetch(RESOURCE_URL);
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.message).toBe('Request failed: socket hang up');
    });

    it('logs the outbound URL with the key masked when verbose', async () => {
        const server = createMockServer(() => ({ status: 200, body: '[]' }));
        await createTestClient(server).fetch('https://geo.example.test/search?q=main&api_key=test-secret', true);
        expect(logger.info).toHaveBeenCalledWith(
            'Fetching data from: https://geo.example.test/search?q=main&api_key=***'
        );
    });

    it('refuses to send once closed', async () => {
        const server = createMockServer(() => ({ status: 200, body: 'ok' }));
        const client = createTestClient(server);
        client.close();
        client.close();
        const result = await client.fetch(RESOURCE_URL);
        expect(result.ok).toBe(false);
        expect(client.isClosed()).toBe(true);
        expect(server.requests).toHaveLength(0);
    });
});

describe('connectTimeoutTransport', () => {
    function fakeRequest() {
        return Object.assign(new EventEmitter(), { destroy: jest.fn<(error?: Error) => void>() });
    }

    function fakeSocket(connecting: boolean) {
        return Object.assign(new EventEmitter(), { connecting });
    }

    beforeEach(() => {
        jest.useFakeTimers();
    });

    afterEach(() => {
        jest.useRealTimers();
    });

    it('destroys the request with ETIMEDOUT when the socket does not connect in time', () => {
        const req = fakeRequest();
        connectTimeoutTransport(2000, () => req).request({ protocol: 'https:' });
        req.emit('socket', fakeSocket(true));

        jest.advanceTimersByTime(1999);
        expect(req.destroy).not.toHaveBeenCalled();
        jest.advanceTimersByTime(1);
        expect(req.destroy).toHaveBeenCalledTimes(1);

        const [error] = req.destroy.mock.calls[0];
        expect(error?.message).toBe('connect timeout after 2000ms');
        expect(error).toMatchObject({ code: 'ETIMEDOUT' });
    });

    it('leaves the request alone once the socket connects', () => {
        const req = fakeRequest();
        const socket = fakeSocket(true);
        connectTimeoutTransport(2000, () => req).request({ protocol: 'http:' });
        req.emit('socket', socket);
        jest.advanceTimersByTime(500);
        socket.emit('connect');

        jest.advanceTimersByTime(10000);
        expect(req.destroy).not.toHaveBeenCalled();
        expect(jest.getTimerCount()).toBe(0);
    });

    it('arms no timer for a pooled socket that is already connected', () => {
        const req = fakeRequest();
        connectTimeoutTransport(2000, () => req).request({ protocol: 'https:' });
        req.emit('socket', fakeSocket(false));
        expect(jest.getTimerCount()).toBe(0);
    });

    it('clears the timer when the request closes first', () => {
        const req = fakeRequest();
        connectTimeoutTransport(2000, () => req).request({ protocol: 'https:' });
        req.emit('socket', fakeSocket(true));
        req.emit('close');
        expect(jest.getTimerCount()).toBe(0);
    });
});

describe('redactUrl', () => {
    it('masks only the api_key value', () => {
        expect(redactUrl('https://x.test/s?api_key=abc&q=1')).toBe('https://x.test/s?api_key=***&q=1');
        expect(redactUrl('https://x.test/s?q=1')).toBe('https://x.test/s?q=1');
    });
});

describe('shared client lifecycle', () => {
    afterEach(() => {
        releaseHttpClient();
    });

    it('returns the same instance until released', () => {
        const factory = jest.fn(() => new HttpClient());
        const first = getHttpClient(factory);
        const second = getHttpClient(factory);
        expect(second).toBe(first);
        expect(factory).toHaveBeenCalledTimes(1);

        releaseHttpClient();
        expect(first.isClosed()).toBe(true);
        const third = getHttpClient(factory);
        expect(third).not.toBe(first);
        expect(factory).toHaveBeenCalledTimes(2);
    });

    it('shares one client across nested acquisitions and releases it once on success', async () => {
        const client = new HttpClient();
        const close = jest.spyOn(client, 'close');

        const seen = await withHttpClient(async acquired => {
            return [acquired, getHttpClient()];
        }, () => client);

        expect(seen[0]).toBe(client);
        expect(seen[1]).toBe(client);
        expect(close).toHaveBeenCalledTimes(1);
    });

    it('releases once when the work throws', async () => {
        const client = new HttpClient();
        const close = jest.spyOn(client, 'close');

        await expect(
            withHttpClient(async () => {
                throw new Error('boom');
            }, () => client)
        ).rejects.toThrow('boom');
        expect(close).toHaveBeenCalledTimes(1);
        expect(client.isClosed()).toBe(true);
    });
});
