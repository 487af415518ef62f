import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import http from 'node:http';
import https from 'node:https';
import { z } from 'zod';
import { createLogger } from '@fauth/logger';
import type { EndpointConfig } from '../config/types.js';
import { classifyErrorMessage } from '../errors/error-code.js';
import { ApiError, HttpError, ResponseDecodeError, getErrorMessage } from '../errors/errors.js';
import type { ApiErrorResponse } from '../errors/types.js';
import { createConnectTimeoutTransport } from './connect-timeout.js';
import type { ResponseSchema, Transport, TransportRequest } from './types.js';
import { LOCALE_HEADER } from './types.js';

const log = createLogger('Transport');

const apiErrorResponseSchema: z.ZodType<ApiErrorResponse, z.ZodTypeDef, unknown> = z.object({
  error: z.object({
    code: z.number(),
    message: z.string(),
    errors: z
      .array(
        z.object({
          domain: z.string(),
          reason: z.string(),
          message: z.string(),
        }),
      )
      .default([]),
  }),
});

// Axios' own timer reports ECONNABORTED, the connect timer ETIMEDOUT
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Builds the axios instance a transport uses unless one is injected: the
 * request timeout bounds the whole exchange, the connect timeout only the
 * connect phase of a new socket.
 */
export function createAxiosInstance(config: EndpointConfig): AxiosInstance {
  const agentOptions = { keepAlive: true, keepAliveMsecs: 1000, maxSockets: 10 };

  return axios.create({
    timeout: config.timeout.requestTimeoutMs,
    maxRedirects: 0,
    // Error statuses carry the provider's envelope; decode them ourselves
    validateStatus: () => true,
    transport: createConnectTimeoutTransport(config.timeout.connectionTimeoutMs),
    httpsAgent: new https.Agent(agentOptions),
    httpAgent: new http.Agent(agentOptions),
  });
}

/**
 * Axios-based transport. Owns one axios instance with keep-alive agents that
 * every session generation built on it shares. An injected instance brings
 * its own timeouts; `config.timeout` only shapes the default one.
 */
export class AxiosTransport implements Transport {
  private readonly config: EndpointConfig;
  private readonly axiosInstance: AxiosInstance;

  constructor(config: EndpointConfig, axiosInstance: AxiosInstance = createAxiosInstance(config)) {
    this.config = config;
    this.axiosInstance = axiosInstance;
  }

  async send<T>(request: TransportRequest, schema: ResponseSchema<T>): Promise<T> {
    const url = this.resolveUrl(request);
    const encoding = request.encoding ?? 'json';
    const headers: Record<string, string> = {};

    if (request.locale) {
      headers[LOCALE_HEADER] = request.locale;
    }

    log.debug(`POST ${request.operation}`);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.axiosInstance.post<unknown>(
        url,
        encoding === 'form' ? toFormBody(request.body) : request.body,
        {
          params: { key: this.config.apiKey },
          headers,
        },
      );
    } catch (error) {
      // An instance that keeps the default validateStatus rejects error statuses
      if (axios.isAxiosError<unknown>(error) && error.response) {
        response = error.response;
      } else {
        throw toHttpError(request, error);
      }
    }

    if (response.status < 200 || response.status >= 300) {
      throw this.toApiError(request, response);
    }

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      throw new ResponseDecodeError(
        `Unexpected response from ${request.operation}`,
        response.data,
        parsed.error.issues,
      );
    }

    return parsed.data;
  }

  private resolveUrl(request: TransportRequest): string {
    const baseUrl =
      request.operation === 'token' ? this.config.secureTokenUrl : this.config.identityToolkitUrl;
    return `${baseUrl}/${request.operation}`;
  }

  private toApiError(
    request: TransportRequest,
    response: AxiosResponse<unknown>,
  ): ApiError | ResponseDecodeError {
    const envelope = apiErrorResponseSchema.safeParse(response.data);
    if (!envelope.success) {
      return new ResponseDecodeError(
        `Unreadable error response from ${request.operation} (${response.status})`,
        response.data,
        envelope.error.issues,
      );
    }

    const code = classifyErrorMessage(envelope.data.error.message);
    log.debug(`${request.operation} failed with ${response.status} (${code.kind})`);

    return new ApiError(response.status, code, envelope.data);
  }
}

function toFormBody(body: Record<string, unknown>): URLSearchParams {
  const form = new URLSearchParams();
  for (const [key, value] of Object.entries(body)) {
    if (value !== undefined) {
      form.append(key, String(value));
    }
  }
  return form;
}

function toHttpError(request: TransportRequest, error: unknown): HttpError {
  const message = `${request.operation} request failed: ${getErrorMessage(error)}`;

  if (axios.isAxiosError(error)) {
    const reason = error.code !== undefined && TIMEOUT_CODES.has(error.code) ? 'timeout' : 'connection';
    return new HttpError(message, reason, { cause: error });
  }

  return new HttpError(message, 'request', { cause: error });
}
