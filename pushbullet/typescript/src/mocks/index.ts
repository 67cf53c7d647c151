/**
 * Mock infrastructure for testing.
 */

import { HttpTransport, HttpRequest, HttpResponse } from '../transport';
import { PushbulletError, fromApiError, parseApiError } from '../errors';
import { Push, PushType } from '../types/push';
import { Device, DeviceList } from '../types/device';
import { User } from '../types/user';
import { UploadSlot } from '../types/upload';

/**
 * Recorded request for verification.
 */
export interface RecordedRequest {
  /** The request that was made. */
  request: HttpRequest;
  /** Timestamp of the request. */
  timestamp: Date;
}

/**
 * Mock response configuration.
 */
export interface MockResponse {
  /** HTTP status code. */
  status: number;
  /** Response headers. */
  headers?: Record<string, string>;
  /** Response body: a JSON value, or a string holding the raw body text. */
  data: unknown;
  /** Transport failure to throw instead of responding. */
  error?: PushbulletError;
}

/**
 * Mock transport for testing.
 *
 * Responses are queued per path; the last one queued for a path is reused once
 * the others are consumed. String bodies are decoded as JSON unless the
 * request does not expect JSON; error bodies, unsuccessful statuses and
 * undecodable bodies are classified the way the axios transport classifies
 * them.
 */
export class MockTransport implements HttpTransport {
  private readonly responses: Map<string, MockResponse[]> = new Map();
  private readonly defaultResponse: MockResponse;
  private readonly recordedRequests: RecordedRequest[] = [];

  constructor(defaultResponse?: MockResponse) {
    this.defaultResponse = defaultResponse ?? {
      status: 200,
      data: {},
    };
  }

  /**
   * Configures a response for a specific path.
   */
  onPath(path: string, response: MockResponse): this {
    const existing = this.responses.get(path) ?? [];
    existing.push(response);
    this.responses.set(path, existing);
    return this;
  }

  /**
   * Gets recorded requests.
   */
  getRecordedRequests(): RecordedRequest[] {
    return [...this.recordedRequests];
  }

  /**
   * Gets the recorded requests made to a path.
   */
  getRequestsTo(path: string): HttpRequest[] {
    return this.recordedRequests
      .filter((recorded) => recorded.request.path === path)
      .map((recorded) => recorded.request);
  }

  async request(req: HttpRequest): Promise<HttpResponse> {
    this.recordedRequests.push({ request: req, timestamp: new Date() });

    const response = this.getNextResponse(req.path);

    if (response.error) {
      throw response.error;
    }

    const text =
      typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
    const parsed = decodeBody(response.data);

    if (parsed.ok) {
      const apiError = parseApiError(parsed.value);
      if (apiError) {
        throw fromApiError(response.status, apiError);
      }
    }
    if (response.status === 401) {
      throw PushbulletError.authentication('Server returned HTTP 401', 401);
    }
    if (response.status < 200 || response.status >= 300) {
      throw PushbulletError.status(response.status, text);
    }

    const result = { status: response.status, headers: response.headers ?? {} };

    if (req.expectJson === false) {
      return { ...result, data: text };
    }
    if (!parsed.ok) {
      throw PushbulletError.invalidResponse(
        `Invalid response JSON from ${req.path}: ${parsed.error.message}`,
        text,
        parsed.error
      );
    }
    return { ...result, data: parsed.value };
  }

  private getNextResponse(path: string): MockResponse {
    const responses = this.responses.get(path);
    if (!responses || responses.length === 0) {
      return this.defaultResponse;
    }

    if (responses.length > 1) {
      return responses.shift() ?? this.defaultResponse;
    }
    return responses[0] ?? this.defaultResponse;
  }
}

function decodeBody(data: unknown): { ok: true; value: unknown } | { ok: false; error: Error } {
  if (typeof data !== 'string') {
    return { ok: true, value: data };
  }
  try {
    return { ok: true, value: JSON.parse(data) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
  }
}

/**
 * Creates a mock transport.
 */
export function createMockTransport(defaultResponse?: MockResponse): MockTransport {
  return new MockTransport(defaultResponse);
}

/**
 * Creates a JSON response mock.
 */
export function jsonResponse(data: unknown, status = 200): MockResponse {
  return { status, data };
}

/**
 * Creates an error response mock in the API's error format.
 */
export function errorResponse(message: string, status = 400, code = 'invalid_request'): MockResponse {
  return {
    status,
    data: {
      error: {
        message,
        type: 'invalid_request',
      },
      error_code: code,
    },
  };
}

/**
 * Creates the response sent for a missing or revoked access token.
 */
export function invalidTokenResponse(): MockResponse {
  return errorResponse('Access token is missing or invalid.', 401, 'invalid_access_token');
}

// ============================================================================
// Mock Fixtures
// ============================================================================

const FIXTURE_TIME = 1700000000.5;

/**
 * Creates a mock user.
 */
export function mockUser(overrides: Partial<User> = {}): User {
  return {
    iden: 'ujtestuser',
    created: FIXTURE_TIME,
    modified: FIXTURE_TIME,
    email: 'tester@example.com',
    email_normalized: 'tester@example.com',
    name: 'Test User',
    image_url: 'https://example.com/avatar.png',
    max_upload_size: 26214400,
    ...overrides,
  };
}

/**
 * Creates a mock device.
 */
export function mockDevice(iden: string, overrides: Partial<Device> = {}): Device {
  return {
    active: true,
    iden,
    created: FIXTURE_TIME,
    modified: FIXTURE_TIME,
    nickname: `Device ${iden}`,
    manufacturer: 'Example',
    model: 'Phone',
    type: 'android',
    kind: 'android',
    icon: 'phone',
    app_version: 300,
    pushable: true,
    ...overrides,
  };
}

/**
 * Creates a mock device list body.
 */
export function mockDeviceList(...devices: Device[]): DeviceList {
  return { devices };
}

/**
 * Creates a mock push.
 */
export function mockPush(type: PushType = 'note', overrides: Partial<Push> = {}): Push {
  return {
    iden: 'ujpushtest',
    type,
    active: true,
    dismissed: false,
    created: FIXTURE_TIME,
    modified: FIXTURE_TIME,
    direction: 'self',
    sender_iden: 'ujtestuser',
    sender_email: 'tester@example.com',
    sender_email_normalized: 'tester@example.com',
    sender_name: 'Test User',
    receiver_iden: 'ujtestuser',
    receiver_email: 'tester@example.com',
    receiver_email_normalized: 'tester@example.com',
    ...overrides,
  };
}

/**
 * Creates a mock upload slot.
 */
export function mockUploadSlot(fileName: string, fileType: string): UploadSlot {
  return {
    file_name: fileName,
    file_type: fileType,
    file_url: `https://files.example.com/ujtest/${fileName}`,
    upload_url: `https://upload.example.com/ujtest/${fileName}?signature=test`,
  };
}
