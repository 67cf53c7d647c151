/**
 * Prints the email of the account behind PUSHBULLET_TOKEN.
 */

import { PushbulletClient, User } from '../src';

export async function getUser(client: PushbulletClient): Promise<User> {
  const user = await client.getUser();
  console.log(`User email is ${user.email}`);
  return user;
}

if (require.main === module) {
  getUser(PushbulletClient.builder().tokenFromEnv().withConsoleLogging().build()).catch(
    (error: unknown) => {
      console.error('error:', error);
      process.exitCode = 1;
    }
  );
}
