/**
 * Basic usage example for the Vaultline TypeScript client.
 *
 * This example demonstrates:
 * - Starting an in-process server
 * - Setting, getting and deleting values over both protocols
 * - JSON values with schema validation
 * - Batches
 * - Handling failures through the logger
 */

import { z } from 'zod';
import {
  VaultlineClient,
  bytesToString,
  createEphemeral,
  type Logger,
} from '../src/index';

const User = z.object({
  name: z.string(),
  email: z.string(),
});

async function main() {
  // Start a throwaway server with protected writes
  const server = await createEphemeral({ http: true, authKey: 'test-secret', authMode: 'writes' });
  const client = server.getClient({ timeout: 2000 });

  try {
    // === Basic Set/Get/Delete ===

    console.log('\n=== Basic Operations ===');

    console.log('Setting key: user:123');
    console.log(`Set succeeded: ${await client.set('user:123', 'Alice')}`);

    const value = await client.get('user:123');
    console.log(`Value: ${value ? bytesToString(value) : 'null'}`);

    console.log('Deleting key: user:123');
    await client.delete('user:123');
    console.log(`Exists after delete: ${await client.exists('user:123')}`);

    // === JSON ===

    console.log('\n=== JSON ===');

    await client.setJSON('user:124', { name: 'Bob', email: 'bob@example.com' });
    const user = await client.getJSON('user:124', User);
    console.log(`User: ${user ? `${user.name} <${user.email}>` : 'null'}`);

    // === Batches ===

    console.log('\n=== Batches ===');

    await client.mset([
      { key: 'color:1', value: 'red' },
      { key: 'color:2', value: 'green' },
    ]);
    const colors = await client.mget(['color:1', 'color:2']);
    for (const [key, color] of colors) {
      console.log(`  ${key} = ${color ? bytesToString(color) : 'null'}`);
    }

    // === HTTP ===

    console.log('\n=== HTTP ===');

    const http = server.getHttpClient();
    const viaHttp = await http.get('color:1');
    console.log(`color:1 over HTTP: ${viaHttp ? bytesToString(viaHttp) : 'null'}`);

    const health = await http.health();
    console.log(`Health: ${health?.status} (${health?.cacheItems} items)`);

    // === Failures ===

    console.log('\n=== Failures ===');

    const reasons: string[] = [];
    const collect: Logger = {
      debug: () => {},
      info: () => {},
      warn: () => {},
      error: (message, cause) => reasons.push(`${message} ${cause instanceof Error ? cause.message : ''}`),
    };
    const anonymous = new VaultlineClient({ address: server.getAddress(), logger: collect });
    console.log(`Anonymous write succeeded: ${await anonymous.set('user:125', 'Eve')}`);
    console.log(`Reason: ${reasons.join('; ')}`);

    console.log('\n=== All operations completed ===');
  } finally {
    await server.stop();
  }
}

// Run the example
main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
