/**
 * Devices service for listing the account's devices.
 */

import { HttpTransport } from '../transport';
import { decodeResponse } from '../types/common';
import { Device, DeviceList, DeviceListSchema } from '../types/device';

/**
 * Devices service interface.
 */
export interface DevicesService {
  /**
   * Lists the devices registered on the account, deleted ones included.
   */
  list(): Promise<Device[]>;
}

/**
 * Default devices service implementation.
 */
export class DefaultDevicesService implements DevicesService {
  private readonly transport: HttpTransport;

  constructor(transport: HttpTransport) {
    this.transport = transport;
  }

  async list(): Promise<Device[]> {
    const response = await this.transport.request({
      method: 'GET',
      path: 'devices',
    });

    const list: DeviceList = decodeResponse(DeviceListSchema, response.data, 'device list');
    return list.devices;
  }
}

/**
 * Creates a devices service.
 */
export function createDevicesService(transport: HttpTransport): DevicesService {
  return new DefaultDevicesService(transport);
}
