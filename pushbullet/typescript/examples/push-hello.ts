/**
 * Pushes a greeting note to the user's own stream.
 */

import { Push, PushbulletClient, note, toSelf } from '../src';

export function pushHello(client: PushbulletClient): Promise<Push> {
  return client.push(toSelf(), note('User Greetings', 'Hello, user!'));
}

if (require.main === module) {
  pushHello(PushbulletClient.builder().tokenFromEnv().withConsoleLogging().build()).catch(
    (error: unknown) => {
      console.error('error:', error);
      process.exitCode = 1;
    }
  );
}
