/**
 * JSON protocol codecs (`application/x-amz-json-1.x`).
 *
 * @module protocol/json
 */

import { Result } from '../command/result.js';
import type { HttpRequest, HttpResponse } from '../http/types.js';
import type { ServiceErrorFields } from '../error/index.js';
import type { ErrorParser, ProtocolCodecs, ProtocolContext, ResultParser, Serializer } from './types.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function joinUrl(endpoint: string, requestUri: string): string {
  const base = endpoint.endsWith('/') ? endpoint.slice(0, -1) : endpoint;
  const path = requestUri.startsWith('/') ? requestUri : `/${requestUri}`;
  return `${base}${path}`;
}

/**
 * Parse a JSON body into an object. An empty body yields `{}`.
 *
 * @throws {Error} If the body is not a JSON object
 */
export function parseJsonBody(body: string): Record<string, unknown> {
  if (body.trim() === '') {
    return {};
  }
  const parsed: unknown = JSON.parse(body);
  if (!isRecord(parsed)) {
    throw new Error('Expected a JSON object in the response body');
  }
  return parsed;
}

/**
 * Build the JSON protocol serializer.
 *
 * Every operation is a POST of the JSON-encoded parameters with the target
 * operation named in `x-amz-target`.
 */
export function createJsonSerializer(context: ProtocolContext): Serializer {
  const { api, endpoint, userAgent } = context;
  const jsonVersion = api.metadata.jsonVersion ?? '1.0';
  const targetPrefix = api.metadata.targetPrefix;

  return (transaction) => {
    const { command } = transaction;
    const operation = api.getOperation(command.name);
    const headers: Record<string, string> = {
      'content-type': `application/x-amz-json-${jsonVersion}`,
    };
    if (targetPrefix) {
      headers['x-amz-target'] = `${targetPrefix}.${command.name}`;
    }
    if (userAgent) {
      headers['user-agent'] = userAgent;
    }

    const request: HttpRequest = {
      method: operation?.http.method ?? 'POST',
      url: joinUrl(endpoint, operation?.http.requestUri ?? '/'),
      headers,
      body: JSON.stringify(command.params),
    };
    return request;
  };
}

/**
 * Parse a JSON protocol response into a Result.
 */
export const parseJsonResult: ResultParser = (_command, response) =>
  new Result(parseJsonBody(response.body), {
    statusCode: response.status,
    requestId: response.headers['x-amzn-requestid'],
    headers: response.headers,
  });

/**
 * Normalize an error code: `com.amazon.coral.service#ResourceNotFoundException`
 * and `ResourceNotFoundException:http://internal` both become
 * `ResourceNotFoundException`.
 */
export function normalizeErrorCode(raw: string): string {
  const afterHash = raw.slice(raw.lastIndexOf('#') + 1);
  const colon = afterHash.indexOf(':');
  return colon === -1 ? afterHash : afterHash.slice(0, colon);
}

function safeParse(body: string): Record<string, unknown> {
  try {
    return parseJsonBody(body);
  } catch {
    return {};
  }
}

/**
 * Extract error fields from a JSON protocol error response. A body that is
 * not JSON yields only the header-derived fields; `type` is reported only
 * when an error code was found.
 */
export const parseJsonError: ErrorParser = (response: HttpResponse) => {
  const data = safeParse(response.body);
  const fields: ServiceErrorFields = {
    requestId: response.headers['x-amzn-requestid'],
  };

  const rawCode =
    typeof data['__type'] === 'string' ? data['__type'] : response.headers['x-amzn-errortype'];
  if (rawCode) {
    fields.code = normalizeErrorCode(rawCode);
    fields.type = response.status < 500 ? 'client' : 'server';
  }

  const message = data['message'] ?? data['Message'];
  if (typeof message === 'string') {
    fields.message = message;
  }

  return fields;
};

/**
 * JSON protocol codec set.
 */
export function createJsonProtocol(context: ProtocolContext): ProtocolCodecs {
  return {
    serializer: createJsonSerializer(context),
    resultParser: parseJsonResult,
    errorParser: parseJsonError,
  };
}
