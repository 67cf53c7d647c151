/**
 * Lists the devices of the account behind PUSHBULLET_TOKEN.
 */

import { Device, PushbulletClient } from '../src';

export async function listDevices(client: PushbulletClient): Promise<Device[]> {
  const devices = await client.listDevices();
  console.log('Devices:', JSON.stringify(devices, null, 2));
  return devices;
}

if (require.main === module) {
  listDevices(PushbulletClient.builder().tokenFromEnv().withConsoleLogging().build()).catch(
    (error: unknown) => {
      console.error('error:', error);
      process.exitCode = 1;
    }
  );
}
