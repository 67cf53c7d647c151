/**
 * Uploads hello.txt and pushes it to the user's own stream.
 */

import { Push, PushbulletClient, uploadFromBuffer } from '../src';

export function uploadHelloWorld(client: PushbulletClient): Promise<Push> {
  return client.upload(uploadFromBuffer('Hello, world!\n', 'hello.txt', 'text/plain'));
}

if (require.main === module) {
  uploadHelloWorld(PushbulletClient.builder().tokenFromEnv().withConsoleLogging().build()).catch(
    (error: unknown) => {
      console.error('error:', error);
      process.exitCode = 1;
    }
  );
}
