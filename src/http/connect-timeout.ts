/**
 * Axios transport that bounds the TCP connect phase separately from the read.
 *
 * axios only has an overall request timeout; this arms a timer when a request
 * is handed a socket that is still connecting and destroys the request with
 * ETIMEDOUT if the socket has not connected when it fires. Sockets reused from
 * the keep-alive pool are already connected and get no timer.
 */

import { EventEmitter } from 'events';
import http from 'http';
import https from 'https';

export interface ConnectingSocket {
    connecting: boolean;
    once(event: 'connect', listener: () => void): unknown;
}

export interface TransportRequest extends EventEmitter {
    destroy(error?: Error): unknown;
}

export type RequestFn = (
    options: http.RequestOptions,
    callback?: (res: http.IncomingMessage) => void
) => TransportRequest;

export interface Transport {
    request: RequestFn;
}

function nodeRequest(options: http.RequestOptions, callback?: (res: http.IncomingMessage) => void): TransportRequest {
    return options.protocol === 'https:' ? https.request(options, callback) : http.request(options, callback);
}

function connectTimeoutError(timeoutMs: number): NodeJS.ErrnoException {
    const error: NodeJS.ErrnoException = new Error(`connect timeout after ${timeoutMs}ms`);
    error.code = 'ETIMEDOUT';
    return error;
}

export function connectTimeoutTransport(connectTimeoutMs: number, request: RequestFn = nodeRequest): Transport {
    return {
        request(options, callback) {
            const req = request(options, callback);
            req.once('socket', (socket: ConnectingSocket) => {
                if (!socket.connecting) return;
                const timer = setTimeout(() => {
                    req.destroy(connectTimeoutError(connectTimeoutMs));
                }, connectTimeoutMs);
                const clear = () => clearTimeout(timer);
                socket.once('connect', clear);
                req.once('close', clear);
            });
            return req;
        },
    };
}
