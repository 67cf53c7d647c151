/**
 * Uploads service: requests an upload slot, then sends the file to it.
 */

import { createReadStream, promises as fs } from 'fs';
import FormData from 'form-data';
import { HttpTransport } from '../transport';
import { PushbulletError } from '../errors';
import { Logger, NoopLogger } from '../observability/logging';
import { decodeResponse } from '../types/common';
import {
  UploadInput,
  UploadRequest,
  UploadSlot,
  UploadSlotSchema,
  UploadedFile,
  uploadFileName,
  uploadFileType,
} from '../types/upload';

/**
 * Uploads service interface.
 */
export interface UploadsService {
  /**
   * Asks the server where a file with this name and type should be uploaded.
   */
  requestSlot(fileName: string, fileType: string): Promise<UploadSlot>;

  /**
   * Sends a file to an upload slot.
   */
  transfer(slot: UploadSlot, input: UploadInput): Promise<UploadedFile>;

  /**
   * Requests a slot and sends the file to it.
   */
  upload(input: UploadInput): Promise<UploadedFile>;
}

/**
 * Default uploads service implementation.
 */
export class DefaultUploadsService implements UploadsService {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(transport: HttpTransport, logger: Logger = new NoopLogger()) {
    this.transport = transport;
    this.logger = logger;
  }

  async requestSlot(fileName: string, fileType: string): Promise<UploadSlot> {
    if (fileName.length === 0) {
      throw PushbulletError.validation('File name is required', 'file_name');
    }
    if (fileType.length === 0) {
      throw PushbulletError.validation('File type is required', 'file_type');
    }

    const body: UploadRequest = { file_name: fileName, file_type: fileType };
    const response = await this.transport.request({
      method: 'POST',
      path: 'upload-request',
      body,
    });

    return decodeResponse(UploadSlotSchema, response.data, 'upload request');
  }

  async transfer(slot: UploadSlot, input: UploadInput): Promise<UploadedFile> {
    await checkReadable(input);

    const form = new FormData();
    appendFile(form, slot, input);

    this.logger.debug('Uploading file', {
      fileName: slot.file_name,
      fileType: slot.file_type,
    });

    await this.transport.request({
      method: 'POST',
      path: slot.upload_url,
      body: form,
      expectJson: false,
    });

    return {
      file_name: slot.file_name,
      file_type: slot.file_type,
      file_url: slot.file_url,
    };
  }

  async upload(input: UploadInput): Promise<UploadedFile> {
    await checkReadable(input);
    const slot = await this.requestSlot(uploadFileName(input), uploadFileType(input));
    return this.transfer(slot, input);
  }
}

// A path is read only once the form is sent, after the slot has been granted.
async function checkReadable(input: UploadInput): Promise<void> {
  if (input.type !== 'path') {
    return;
  }

  const stats = await fs.stat(input.path).catch((error: unknown) => {
    const reason = error instanceof Error ? error.message : String(error);
    throw PushbulletError.validation(`Cannot read ${input.path}: ${reason}`, 'path');
  });
  if (!stats.isFile()) {
    throw PushbulletError.validation(`${input.path} is not a file`, 'path');
  }
}

// The part is named and typed after the slot, which may differ from the input.
function appendFile(form: FormData, slot: UploadSlot, input: UploadInput): void {
  const options = { filename: slot.file_name, contentType: slot.file_type };

  switch (input.type) {
    case 'path':
      form.append('file', createReadStream(input.path), options);
      break;

    case 'buffer':
      form.append('file', input.buffer, { ...options, knownLength: input.buffer.length });
      break;

    case 'stream':
      form.append(
        'file',
        input.stream,
        input.knownLength === undefined ? options : { ...options, knownLength: input.knownLength }
      );
      break;
  }
}

/**
 * Creates an uploads service.
 */
export function createUploadsService(transport: HttpTransport, logger?: Logger): UploadsService {
  return new DefaultUploadsService(transport, logger);
}
