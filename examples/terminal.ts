/**
 * Sync a real database to a real API, asking for credentials on the terminal.
 *
 *   SYNC_API_URL=https://api.example.test npx tsx examples/terminal.ts ./tienda.db
 */

import { createInterface } from 'node:readline/promises';
import {
  ConnectionResolver,
  HttpApiClient,
  SyncEngine,
  DEPENDENCY_ORDER,
  describeError,
  inspectDatabase,
  loadConfig,
  setLogLevel,
  validateConnectionParams,
  type CredentialProvider,
} from '../src/index';

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const [host = '', database = '', user = '', password = ''] = process.argv.slice(2);
  const validation = validateConnectionParams({ host, database, user, password, connectTimeoutMs: config.connectTimeoutMs });
  if (!validation.success) {
    console.error(validation.message);
    process.exitCode = 1;
    return;
  }

  const connector = await new ConnectionResolver().resolve(validation.data);
  const inspection = await inspectDatabase(connector);
  console.log(`Connected (${inspection.engine}), ${inspection.tables.length} tables`);
  console.log(inspection.preview);

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  const credentialProvider: CredentialProvider = {
    requestCredentials: async ({ error }) => {
      if (error) console.log(`Login failed: ${error}`);
      const username = (await rl.question('API user (empty to cancel): ')).trim();
      if (!username) return null;
      return { username, password: await rl.question('API password: ') };
    },
  };

  const engine = new SyncEngine({
    connector,
    api: new HttpApiClient({ baseUrl: config.apiBaseUrl, timeout: config.httpTimeoutMs }),
    credentialProvider,
    tables: [...DEPENDENCY_ORDER],
    syncInterval: 0,
    tokenLifetimeMs: config.tokenLifetimeMs,
  });

  try {
    const result = await engine.sync();
    console.log(`Sync ${result.status}${result.error ? `: ${describeError(result.error)}` : ''}`);
  } finally {
    rl.close();
    await connector.close();
  }
}

main().catch(error => {
  console.error(describeError(error));
  process.exitCode = 1;
});
