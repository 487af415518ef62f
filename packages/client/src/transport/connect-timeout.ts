import http from 'node:http';
import https from 'node:https';
import { TLSSocket } from 'node:tls';

type RequestFunction = (
  options: http.RequestOptions,
  callback?: (response: http.IncomingMessage) => void,
) => http.ClientRequest;

/** The `request` half of node's http modules, as axios' `transport` option expects it. */
type RequestTransport = {
  request: RequestFunction;
};

/**
 * Raised on the request when a new socket has not finished connecting in
 * time. Axios keeps the `code`, which the transport reports as a timeout.
 */
export class ConnectTimeoutError extends Error {
  override name = 'ConnectTimeoutError';
  readonly code = 'ETIMEDOUT';

  constructor(timeoutMs: number) {
    super(`Connection not established within ${timeoutMs}ms`);
  }
}

/**
 * Bounds the connect phase of each request: TCP connect for http, TCP plus
 * TLS handshake for https. Reused keep-alive sockets are not timed. Axios'
 * own `timeout` still bounds the whole exchange.
 */
export function createConnectTimeoutTransport(timeoutMs: number): RequestTransport {
  return {
    request: (options, callback) => {
      const request: RequestFunction = options.protocol === 'https:' ? https.request : http.request;
      const clientRequest = request(options, callback);

      clientRequest.once('socket', (socket) => {
        if (clientRequest.reusedSocket) {
          return;
        }

        const timer = setTimeout(() => {
          clientRequest.destroy(new ConnectTimeoutError(timeoutMs));
        }, timeoutMs);
        const clear = () => clearTimeout(timer);

        socket.once(socket instanceof TLSSocket ? 'secureConnect' : 'connect', clear);
        socket.once('close', clear);
        clientRequest.once('response', clear);
      });

      return clientRequest;
    },
  };
}

export type { RequestTransport };
