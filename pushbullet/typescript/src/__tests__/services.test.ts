/**
 * Tests for the PushBullet services.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import FormData from 'form-data';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable } from 'stream';
import { DefaultPushesService, buildPushBody } from '../services/pushes';
import { DefaultDevicesService } from '../services/devices';
import { DefaultUsersService } from '../services/users';
import { DefaultUploadsService } from '../services/uploads';
import { PushbulletError, PushbulletErrorCode } from '../errors';
import {
  MockTransport,
  jsonResponse,
  mockDevice,
  mockDeviceList,
  mockPush,
  mockUploadSlot,
  mockUser,
} from '../mocks';
import { link, note, toChannel, toClient, toDevice, toEmail, toSelf } from '../types/push';
import { pushableDevices } from '../types/device';
import {
  contentTypeFor,
  uploadFileName,
  uploadFileType,
  uploadFromBuffer,
  uploadFromPath,
  uploadFromStream,
} from '../types/upload';

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

function formBody(body: unknown): FormData {
  if (!(body instanceof FormData)) {
    throw new Error('expected a multipart form body');
  }
  return body;
}

function formText(body: unknown): string {
  return formBody(body).getBuffer().toString('utf-8');
}

function drainForm(body: unknown): Promise<string> {
  const form = formBody(body);
  const chunks: Buffer[] = [];
  return new Promise((resolve, reject) => {
    form.on('data', (chunk: Buffer | string) => {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    });
    form.on('end', () => resolve(Buffer.concat(chunks).toString('utf-8')));
    form.on('error', reject);
    form.resume();
  });
}

describe('buildPushBody', () => {
  it('should send nothing extra for the own stream', () => {
    expect(buildPushBody(toSelf(), note('User Greetings', 'Hello, user!'))).toEqual({
      type: 'note',
      title: 'User Greetings',
      body: 'Hello, user!',
    });
  });

  it('should flatten a device target into a link push', () => {
    expect(buildPushBody(toDevice('ujdevice1'), link('Docs', 'Read me', 'https://example.com'))).toEqual({
      device_iden: 'ujdevice1',
      type: 'link',
      title: 'Docs',
      body: 'Read me',
      url: 'https://example.com',
    });
  });

  it('should name email, channel and client targets', () => {
    const data = note('', 'Hi');

    expect(buildPushBody(toEmail('friend@example.com'), data)).toMatchObject({
      email: 'friend@example.com',
    });
    expect(buildPushBody(toChannel('news'), data)).toMatchObject({ channel_tag: 'news' });
    expect(buildPushBody(toClient('ujclient'), data)).toMatchObject({ client_iden: 'ujclient' });
  });

  it('should send every file field', () => {
    expect(
      buildPushBody(toSelf(), {
        type: 'file',
        body: '',
        file_name: 'hello.txt',
        file_type: 'text/plain',
        file_url: 'https://files.example.com/ujtest/hello.txt',
      })
    ).toEqual({
      type: 'file',
      body: '',
      file_name: 'hello.txt',
      file_type: 'text/plain',
      file_url: 'https://files.example.com/ujtest/hello.txt',
    });
  });

  it('should reject an empty device iden', () => {
    expect(() => buildPushBody(toDevice(''), note('', 'Hi'))).toThrow('device_iden cannot be empty');
  });
});

describe('PushesService', () => {
  let transport: MockTransport;
  let service: DefaultPushesService;

  beforeEach(() => {
    transport = new MockTransport();
    service = new DefaultPushesService(transport);
  });

  it('should accept a note with an empty title', async () => {
    transport.onPath('pushes', jsonResponse(mockPush('note', { title: '', body: 'Hello' })));

    const push = await service.create(toSelf(), note('', 'Hello'));

    expect(push.type).toBe('note');
    expect(push.body).toBe('Hello');
    const requests = transport.getRequestsTo('pushes');
    expect(requests).toHaveLength(1);
    expect(requests[0]?.method).toBe('POST');
    expect(requests[0]?.body).toEqual({ type: 'note', title: '', body: 'Hello' });
  });

  it('should reject invalid input before sending', async () => {
    const error = await rejection(service.create(toSelf(), link('Docs', '', '')));

    expect(error.code).toBe(PushbulletErrorCode.Validation);
    expect(error.details.param).toBe('url');
    expect(transport.getRecordedRequests()).toHaveLength(0);
  });

  it('should reject a response that is not a push', async () => {
    transport.onPath('pushes', jsonResponse({ iden: 'ujpushtest' }));

    const error = await rejection(service.create(toSelf(), note('', 'Hello')));

    expect(error.code).toBe(PushbulletErrorCode.InvalidResponse);
    expect(error.message).toBe('Invalid push response at type: Required');
  });
});

describe('DevicesService', () => {
  let transport: MockTransport;
  let service: DefaultDevicesService;

  beforeEach(() => {
    transport = new MockTransport();
    service = new DefaultDevicesService(transport);
  });

  it('should list devices, deleted ones included', async () => {
    const deleted = { active: false, iden: 'ujdeleted', created: 1.5, modified: 2.5 };
    transport.onPath('devices', jsonResponse(mockDeviceList(mockDevice('ujdevice1'), deleted)));

    const devices = await service.list();

    expect(devices).toHaveLength(2);
    expect(devices[0]?.nickname).toBe('Device ujdevice1');
    expect(devices[1]).toEqual(deleted);
    expect(transport.getRequestsTo('devices')[0]?.method).toBe('GET');
  });

  it('should return an empty list', async () => {
    transport.onPath('devices', jsonResponse({ devices: [] }));

    expect(await service.list()).toEqual([]);
  });

  it('should reject a body without devices', async () => {
    transport.onPath('devices', jsonResponse({ accounts: [] }));

    const error = await rejection(service.list());

    expect(error.code).toBe(PushbulletErrorCode.InvalidResponse);
    expect(error.message).toBe('Invalid device list response at devices: Required');
  });

  it('should pick the devices that accept pushes', () => {
    const devices = [
      mockDevice('ujphone'),
      mockDevice('ujold', { active: false }),
      mockDevice('ujbrowser', { pushable: false }),
      { active: true, iden: 'ujbare', created: 1, modified: 1 },
    ];

    expect(pushableDevices(devices).map((device) => device.iden)).toEqual(['ujphone', 'ujbare']);
  });
});

describe('UsersService', () => {
  it('should get the current user', async () => {
    const transport = new MockTransport();
    transport.onPath('users/me', jsonResponse(mockUser()));

    const user = await new DefaultUsersService(transport).me();

    expect(user).toEqual(mockUser());
    expect(transport.getRequestsTo('users/me')[0]?.method).toBe('GET');
  });

  it('should allow a user without an image', async () => {
    const transport = new MockTransport();
    const { image_url: _omitted, ...withoutImage } = mockUser();
    transport.onPath('users/me', jsonResponse(withoutImage));

    const user = await new DefaultUsersService(transport).me();

    expect(user.image_url).toBeUndefined();
    expect(user.email).toBe('tester@example.com');
  });
});

describe('UploadsService', () => {
  const slot = mockUploadSlot('hello.txt', 'text/plain');
  let transport: MockTransport;
  let service: DefaultUploadsService;

  beforeEach(() => {
    transport = new MockTransport();
    service = new DefaultUploadsService(transport);
  });

  it('should request a slot and send the file to it', async () => {
    transport.onPath('upload-request', jsonResponse(slot));
    transport.onPath(slot.upload_url, jsonResponse('', 204));

    const uploaded = await service.upload(uploadFromBuffer('Hello, world!\n', 'hello.txt'));

    expect(uploaded).toEqual({
      file_name: 'hello.txt',
      file_type: 'text/plain',
      file_url: 'https://files.example.com/ujtest/hello.txt',
    });

    const [slotRequest, transfer] = transport.getRecordedRequests().map((r) => r.request);
    expect(slotRequest?.path).toBe('upload-request');
    expect(slotRequest?.body).toEqual({ file_name: 'hello.txt', file_type: 'text/plain' });
    expect(transfer?.path).toBe(slot.upload_url);
    expect(transfer?.method).toBe('POST');
    expect(transfer?.expectJson).toBe(false);

    const text = formText(transfer?.body);
    expect(text).toContain('Content-Disposition: form-data; name="file"; filename="hello.txt"');
    expect(text).toContain('Content-Type: text/plain');
    expect(text).toContain('Hello, world!\n');
  });

  it('should use the name and type the server chose', async () => {
    transport.onPath('upload-request', jsonResponse(mockUploadSlot('hello.t', 'application/octet-stream')));

    const uploaded = await service.upload(uploadFromBuffer('Hello', 'hello.txt', 'text/plain'));

    expect(uploaded.file_name).toBe('hello.t');
    expect(uploaded.file_type).toBe('application/octet-stream');
    const transfer = transport.getRecordedRequests()[1]?.request;
    expect(formText(transfer?.body)).toContain('filename="hello.t"');
  });

  it('should send the slot request body', async () => {
    transport.onPath('upload-request', jsonResponse(mockUploadSlot('report.pdf', 'application/pdf')));

    const requested = await service.requestSlot('report.pdf', 'application/pdf');

    expect(requested.upload_url).toBe('https://upload.example.com/ujtest/report.pdf?signature=test');
    expect(transport.getRequestsTo('upload-request')[0]?.body).toEqual({
      file_name: 'report.pdf',
      file_type: 'application/pdf',
    });
  });

  it('should name path inputs after the file', () => {
    const input = uploadFromPath('/tmp/reports/report.pdf');

    expect(uploadFileName(input)).toBe('report.pdf');
    expect(uploadFileType(input)).toBe('application/pdf');
    expect(uploadFileType(uploadFromPath('/tmp/reports/report.pdf', 'application/x-report'))).toBe(
      'application/x-report'
    );
  });

  it('should send streams as form parts', async () => {
    const stream = Readable.from(['Hello']);

    await service.transfer(slot, uploadFromStream(stream, 'hello.txt'));

    const transfer = transport.getRequestsTo(slot.upload_url)[0];
    expect(formBody(transfer?.body).hasKnownLength()).toBe(false);
  });

  it('should give streams their known length', async () => {
    const stream = Readable.from([Buffer.from('Hello')]);

    await service.transfer(slot, uploadFromStream(stream, 'hello.txt', 'text/plain', 5));

    const transfer = transport.getRequestsTo(slot.upload_url)[0];
    expect(formBody(transfer?.body).hasKnownLength()).toBe(true);
  });

  it('should send the contents of a file on disk', async () => {
    const dir = await fs.mkdtemp(join(tmpdir(), 'pushbullet-upload-'));
    try {
      const path = join(dir, 'report.txt');
      await fs.writeFile(path, 'Quarterly numbers\n');
      transport.onPath('upload-request', jsonResponse(mockUploadSlot('report.txt', 'text/plain')));

      const uploaded = await service.upload(uploadFromPath(path));

      expect(uploaded.file_name).toBe('report.txt');
      expect(transport.getRequestsTo('upload-request')[0]?.body).toEqual({
        file_name: 'report.txt',
        file_type: 'text/plain',
      });
      const transfer = transport.getRecordedRequests()[1]?.request;
      const text = await drainForm(transfer?.body);
      expect(text).toContain('filename="report.txt"');
      expect(text).toContain('Quarterly numbers\n');
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('should reject a missing file before requesting a slot', async () => {
    const path = join(tmpdir(), 'pushbullet-missing-dir', 'missing.txt');

    const error = await rejection(service.upload(uploadFromPath(path)));

    expect(error.code).toBe(PushbulletErrorCode.Validation);
    expect(error.details.param).toBe('path');
    expect(error.message).toContain(`Cannot read ${path}: ENOENT`);
    expect(transport.getRecordedRequests()).toHaveLength(0);
  });

  it('should reject a directory in place of a file', async () => {
    const dir = tmpdir();

    const error = await rejection(service.transfer(slot, uploadFromPath(dir)));

    expect(error.code).toBe(PushbulletErrorCode.Validation);
    expect(error.message).toBe(`${dir} is not a file`);
    expect(transport.getRecordedRequests()).toHaveLength(0);
  });

  it('should reject an upload without a file name', async () => {
    const error = await rejection(service.upload(uploadFromBuffer('Hello', '')));

    expect(error.code).toBe(PushbulletErrorCode.Validation);
    expect(error.details.param).toBe('file_name');
    expect(transport.getRecordedRequests()).toHaveLength(0);
  });

  it('should reject a slot without an upload URL', async () => {
    transport.onPath(
      'upload-request',
      jsonResponse({ file_name: 'hello.txt', file_type: 'text/plain', file_url: 'x' })
    );

    const error = await rejection(service.upload(uploadFromBuffer('Hello', 'hello.txt')));

    expect(error.code).toBe(PushbulletErrorCode.InvalidResponse);
    expect(transport.getRecordedRequests()).toHaveLength(1);
  });

  it('should infer content types from extensions', () => {
    expect(contentTypeFor('photo.JPG')).toBe('image/jpeg');
    expect(contentTypeFor('notes.txt')).toBe('text/plain');
    expect(contentTypeFor('archive.tar.unknown')).toBe('application/octet-stream');
    expect(contentTypeFor('README')).toBe('application/octet-stream');
  });
});
