/**
 * Tests for AWS Signature Version 4 implementation
 */

import { createHash, createHmac } from 'crypto';
import { describe, it, expect, beforeEach } from 'vitest';
import {
  signRequest,
  createStringToSign,
  deriveSigningKey,
  buildAuthorizationHeader,
  getSigningKeyCache,
  formatDate,
  formatDateTime,
} from './v4.js';
import { SigningError } from './error.js';
import type { HttpRequest } from '../http/types.js';

const sha256 = (data: string): string => createHash('sha256').update(data, 'utf8').digest('hex');
const hmac = (key: Buffer | string, data: string): Buffer => createHmac('sha256', key).update(data, 'utf8').digest();

const SIGNING_DATE = new Date(Date.UTC(2024, 0, 15, 8, 30, 45));

const credentials = {
  accessKeyId: 'test-access-key',
  secretAccessKey: 'test-secret',
};

function listTablesRequest(): HttpRequest {
  return {
    method: 'POST',
    url: 'https://dynamodb.us-east-1.amazonaws.com/',
    headers: {
      'Content-Type': 'application/x-amz-json-1.0',
      'X-Amz-Target': 'DynamoDB_20120810.ListTables',
      'User-Agent': 'test-agent',
    },
    body: '{}',
  };
}

describe('formatDate / formatDateTime', () => {
  it('should format the date stamp', () => {
    expect(formatDate(SIGNING_DATE)).toBe('20240115');
  });

  it('should format the timestamp without separators or milliseconds', () => {
    expect(formatDateTime(SIGNING_DATE)).toBe('20240115T083045Z');
  });
});

describe('deriveSigningKey', () => {
  beforeEach(() => {
    getSigningKeyCache().clear();
  });

  it('should derive the key through the HMAC chain', () => {
    const expected = hmac(hmac(hmac(hmac('AWS4test-secret', '20240115'), 'us-east-1'), 'dynamodb'), 'aws4_request');

    const key = deriveSigningKey('test-secret', '20240115', 'us-east-1', 'dynamodb');

    expect(key.length).toBe(32);
    expect(key.toString('hex')).toBe(expected.toString('hex'));
  });

  it('should cache derived keys', () => {
    const cache = getSigningKeyCache();

    const first = deriveSigningKey('test-secret', '20240115', 'us-east-1', 'dynamodb');
    expect(cache.size).toBe(1);

    const second = deriveSigningKey('test-secret', '20240115', 'us-east-1', 'dynamodb');
    expect(cache.size).toBe(1);
    expect(second).toBe(first);
  });

  it('should keep keys for different secrets apart', () => {
    const first = deriveSigningKey('test-secret', '20240115', 'us-east-1', 'dynamodb');
    const second = deriveSigningKey('other-secret', '20240115', 'us-east-1', 'dynamodb');

    expect(getSigningKeyCache().size).toBe(2);
    expect(second.equals(first)).toBe(false);
  });
});

describe('createStringToSign', () => {
  it('should join algorithm, timestamp, scope and hash', () => {
    expect(createStringToSign('20240115T083045Z', '20240115/us-east-1/dynamodb/aws4_request', 'abc')).toBe(
      'AWS4-HMAC-SHA256\n20240115T083045Z\n20240115/us-east-1/dynamodb/aws4_request\nabc'
    );
  });
});

describe('buildAuthorizationHeader', () => {
  it('should build the header value', () => {
    expect(
      buildAuthorizationHeader('test-access-key', '20240115/us-east-1/dynamodb/aws4_request', 'host;x-amz-date', 'abc')
    ).toBe(
      'AWS4-HMAC-SHA256 Credential=test-access-key/20240115/us-east-1/dynamodb/aws4_request, SignedHeaders=host;x-amz-date, Signature=abc'
    );
  });
});

describe('signRequest', () => {
  const params = { region: 'us-east-1', service: 'dynamodb', credentials, date: SIGNING_DATE };

  it('should add the signing headers', () => {
    const signed = signRequest(listTablesRequest(), params);

    expect(signed.headers['host']).toBe('dynamodb.us-east-1.amazonaws.com');
    expect(signed.headers['x-amz-date']).toBe('20240115T083045Z');
    expect(signed.headers['x-amz-content-sha256']).toBe(sha256('{}'));
    expect(signed.headers['x-amz-security-token']).toBeUndefined();
  });

  it('should produce the expected signature', () => {
    const payloadHash = sha256('{}');
    const signedHeaders = 'content-type;host;x-amz-content-sha256;x-amz-date;x-amz-target';
    const canonicalRequest = [
      'POST',
      '/',
      '',
      [
        'content-type:application/x-amz-json-1.0',
        'host:dynamodb.us-east-1.amazonaws.com',
        `x-amz-content-sha256:${payloadHash}`,
        'x-amz-date:20240115T083045Z',
        'x-amz-target:DynamoDB_20120810.ListTables',
      ].join('\n') + '\n',
      signedHeaders,
      payloadHash,
    ].join('\n');
    const stringToSign = [
      'AWS4-HMAC-SHA256',
      '20240115T083045Z',
      '20240115/us-east-1/dynamodb/aws4_request',
      sha256(canonicalRequest),
    ].join('\n');
    const signingKey = hmac(hmac(hmac(hmac('AWS4test-secret', '20240115'), 'us-east-1'), 'dynamodb'), 'aws4_request');
    const signature = createHmac('sha256', signingKey).update(stringToSign, 'utf8').digest('hex');

    const signed = signRequest(listTablesRequest(), params);

    expect(signed.headers['authorization']).toBe(
      `AWS4-HMAC-SHA256 Credential=test-access-key/20240115/us-east-1/dynamodb/aws4_request, SignedHeaders=${signedHeaders}, Signature=${signature}`
    );
  });

  it('should sign the session token of temporary credentials', () => {
    const signed = signRequest(listTablesRequest(), {
      ...params,
      credentials: { ...credentials, sessionToken: 'test-session-token' },
    });

    expect(signed.headers['x-amz-security-token']).toBe('test-session-token');
    expect(signed.headers['authorization']).toContain(
      'SignedHeaders=content-type;host;x-amz-content-sha256;x-amz-date;x-amz-security-token;x-amz-target,'
    );
  });

  it('should replace a previous signature when signed again', () => {
    const first = signRequest(listTablesRequest(), params);
    const later = new Date(Date.UTC(2024, 0, 15, 8, 35, 0));

    const second = signRequest(first, { ...params, date: later });

    expect(second.headers['x-amz-date']).toBe('20240115T083500Z');
    expect(second.headers['authorization']).not.toBe(first.headers['authorization']);
    expect(Object.keys(second.headers).filter((name) => name === 'authorization')).toHaveLength(1);
  });

  it('should not mutate the input request', () => {
    const request = listTablesRequest();

    signRequest(request, params);

    expect(request.headers).toEqual({
      'Content-Type': 'application/x-amz-json-1.0',
      'X-Amz-Target': 'DynamoDB_20120810.ListTables',
      'User-Agent': 'test-agent',
    });
  });

  it('should reject an invalid URL', () => {
    const request = { ...listTablesRequest(), url: 'not a url' };

    expect(() => signRequest(request, params)).toThrow(SigningError);
    try {
      signRequest(request, params);
    } catch (error) {
      expect(error).toMatchObject({ code: 'INVALID_URL' });
    }
  });
});
