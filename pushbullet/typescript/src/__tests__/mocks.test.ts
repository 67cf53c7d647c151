/**
 * Tests for the mock transport.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PushbulletError, PushbulletErrorCode } from '../errors';
import { MockTransport, errorResponse, jsonResponse } from '../mocks';

async function rejection(promise: Promise<unknown>): Promise<PushbulletError> {
  const error = await promise.then(
    () => undefined,
    (reason: unknown) => reason
  );
  if (!(error instanceof PushbulletError)) {
    throw new Error(`expected a PushbulletError, got ${String(error)}`);
  }
  return error;
}

describe('MockTransport', () => {
  let transport: MockTransport;

  beforeEach(() => {
    transport = new MockTransport();
  });

  it('should reuse the last queued response', async () => {
    transport.onPath('devices', jsonResponse({ devices: [] }));
    transport.onPath('devices', jsonResponse({ devices: [], cursor: 'next' }));

    const first = await transport.request({ method: 'GET', path: 'devices' });
    const second = await transport.request({ method: 'GET', path: 'devices' });
    const third = await transport.request({ method: 'GET', path: 'devices' });

    expect(first.data).toEqual({ devices: [] });
    expect(second.data).toEqual({ devices: [], cursor: 'next' });
    expect(third.data).toEqual({ devices: [], cursor: 'next' });
  });

  it('should decode string bodies as JSON', async () => {
    transport.onPath('users/me', jsonResponse('{"iden":"ujtestuser"}'));

    const response = await transport.request({ method: 'GET', path: 'users/me' });

    expect(response.data).toEqual({ iden: 'ujtestuser' });
  });

  it('should report a success body that is not JSON', async () => {
    transport.onPath('devices', jsonResponse('<html>maintenance</html>'));

    const error = await rejection(transport.request({ method: 'GET', path: 'devices' }));

    expect(error.code).toBe(PushbulletErrorCode.InvalidResponse);
    expect(error.details.body).toBe('<html>maintenance</html>');
  });

  it('should return the raw text when JSON is not expected', async () => {
    transport.onPath('https://upload.example.com/ujtest/hello.txt', jsonResponse('OK', 204));

    const response = await transport.request({
      method: 'POST',
      path: 'https://upload.example.com/ujtest/hello.txt',
      expectJson: false,
    });

    expect(response.data).toBe('OK');
  });

  it('should classify error bodies sent as text', async () => {
    transport.onPath('pushes', jsonResponse('{"error":{"message":"Bad push","code":"invalid_request"}}', 400));

    const error = await rejection(transport.request({ method: 'POST', path: 'pushes' }));

    expect(error.code).toBe(PushbulletErrorCode.Api);
    expect(error.message).toBe('Bad push');
    expect(error.details.apiCode).toBe('invalid_request');
  });

  it('should report the raw body of other failures', async () => {
    transport.onPath('devices', jsonResponse('Bad Gateway', 502));

    const error = await rejection(transport.request({ method: 'GET', path: 'devices' }));

    expect(error.code).toBe(PushbulletErrorCode.Status);
    expect(error.details.body).toBe('Bad Gateway');
  });

  it('should classify structured errors', async () => {
    transport.onPath('pushes', errorResponse('Too many pushes', 429, 'ratelimited'));

    const error = await rejection(transport.request({ method: 'POST', path: 'pushes' }));

    expect(error.code).toBe(PushbulletErrorCode.Api);
    expect(error.details.apiCode).toBe('ratelimited');
    expect(error.details.statusCode).toBe(429);
  });

  it('should throw a configured transport failure', async () => {
    const failure = PushbulletError.network('Network error: connect ECONNREFUSED');
    transport.onPath('devices', { status: 0, data: '', error: failure });

    const error = await rejection(transport.request({ method: 'GET', path: 'devices' }));

    expect(error).toBe(failure);
    expect(transport.getRequestsTo('devices')).toHaveLength(1);
  });
});
