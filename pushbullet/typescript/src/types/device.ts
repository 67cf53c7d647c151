/**
 * Device types.
 */

import { z } from 'zod';
import type { Iden, UnixTimestamp } from './common';

/**
 * A device registered on the account.
 *
 * Deleted devices are still listed, with `active: false` and only the
 * identifying fields.
 */
export interface Device {
  active: boolean;
  iden: Iden;
  created: UnixTimestamp;
  modified: UnixTimestamp;
  nickname?: string;
  manufacturer?: string;
  model?: string;
  type?: string;
  kind?: string;
  icon?: string;
  app_version?: number;
  /** Whether pushes can be sent to this device. */
  pushable?: boolean;
}

export const DeviceSchema = z.object({
  active: z.boolean(),
  iden: z.string(),
  created: z.number(),
  modified: z.number(),
  nickname: z.string().optional(),
  manufacturer: z.string().optional(),
  model: z.string().optional(),
  type: z.string().optional(),
  kind: z.string().optional(),
  icon: z.string().optional(),
  app_version: z.number().optional(),
  pushable: z.boolean().optional(),
});

/**
 * Body of the device list response.
 */
export interface DeviceList {
  devices: Device[];
}

export const DeviceListSchema = z.object({
  devices: z.array(DeviceSchema),
});

/**
 * Returns the devices that are active and accept pushes.
 */
export function pushableDevices(devices: Device[]): Device[] {
  return devices.filter((device) => device.active && device.pushable !== false);
}
