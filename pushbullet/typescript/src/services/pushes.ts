/**
 * Pushes service for sending notes, links and files.
 */

import { HttpTransport } from '../transport';
import { PushbulletError } from '../errors';
import { Logger, NoopLogger } from '../observability/logging';
import { decodeResponse } from '../types/common';
import { Push, PushData, PushSchema, PushTarget } from '../types/push';

/**
 * Pushes service interface.
 */
export interface PushesService {
  /**
   * Sends data to a target and returns the created push.
   */
  create(target: PushTarget, data: PushData): Promise<Push>;
}

/**
 * Default pushes service implementation.
 */
export class DefaultPushesService implements PushesService {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(transport: HttpTransport, logger: Logger = new NoopLogger()) {
    this.transport = transport;
    this.logger = logger;
  }

  async create(target: PushTarget, data: PushData): Promise<Push> {
    const body = buildPushBody(target, data);
    this.logger.debug('Creating push', { body });

    const response = await this.transport.request({
      method: 'POST',
      path: 'pushes',
      body,
    });

    return decodeResponse(PushSchema, response.data, 'push');
  }
}

/**
 * Flattens a target and its content into the body of a create-push request.
 */
export function buildPushBody(target: PushTarget, data: PushData): Record<string, string> {
  return { ...targetFields(target), ...dataFields(data) };
}

function targetFields(target: PushTarget): Record<string, string> {
  switch (target.type) {
    case 'self':
      return {};
    case 'device':
      return { device_iden: required(target.device_iden, 'device_iden') };
    case 'email':
      return { email: required(target.email, 'email') };
    case 'channel':
      return { channel_tag: required(target.channel_tag, 'channel_tag') };
    case 'client':
      return { client_iden: required(target.client_iden, 'client_iden') };
  }
}

function dataFields(data: PushData): Record<string, string> {
  switch (data.type) {
    case 'note':
      return { type: 'note', title: data.title, body: data.body };
    case 'link':
      return {
        type: 'link',
        title: data.title,
        body: data.body,
        url: required(data.url, 'url'),
      };
    case 'file':
      return {
        type: 'file',
        body: data.body,
        file_name: required(data.file_name, 'file_name'),
        file_type: required(data.file_type, 'file_type'),
        file_url: required(data.file_url, 'file_url'),
      };
  }
}

function required(value: string, param: string): string {
  if (value.length === 0) {
    throw PushbulletError.validation(`${param} cannot be empty`, param);
  }
  return value;
}

/**
 * Creates a pushes service.
 */
export function createPushesService(transport: HttpTransport, logger?: Logger): PushesService {
  return new DefaultPushesService(transport, logger);
}
