/**
 * Basic example showing how to use the sync engine
 */

import {
  SyncEngine,
  MemoryConnector,
  MockApiClient,
  ENTITY,
  SYNC_EVENT,
  type CredentialProvider,
} from '../src/index';

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
async function basicExample() {
  console.log('🚀 Starting Basic Sync Engine Example\n');

  // Local tables with a few rows waiting to be uploaded
  const connector = new MemoryConnector({
    producto: {
      columns: ['Id', 'Nombre', 'Precio', 'IsSynced'],
      rows: [
        { Id: 1, Nombre: 'Pan', Precio: 1.2, IsSynced: 0 },
        { Id: 2, Nombre: 'Leche', Precio: 0.95, IsSynced: null },
        { Id: 3, Nombre: 'Huevos', Precio: 2.5, IsSynced: 1 },
      ],
    },
    cliente: {
      columns: ['Id', 'Nombre', 'Correo', 'IsSynced'],
      rows: [{ Id: 1, Nombre: 'Ana', Correo: ' ana@example.test ', IsSynced: 0 }],
    },
  });

  const api = new MockApiClient({ users: { clerk: 'test-secret' } });

  // Answers the first prompt, cancels any retry
  const credentialProvider: CredentialProvider = {
    requestCredentials: async ({ attempt, error }) => {
      if (error) console.log('🔑 Login rejected:', error);
      return attempt === 1 ? { username: 'clerk', password: 'test-secret' } : null;
    },
  };

  const syncEngine = new SyncEngine({
    connector,
    api,
    credentialProvider,
    tables: ['producto', 'cliente', 'venta'],
    syncInterval: 5000, // Sync every 5 seconds
  });

  // Set up event listeners
  syncEngine.on(SYNC_EVENT.SESSION_STATE_CHANGED, ({ state }) => {
    console.log('🔐 Session:', state);
  });

  syncEngine.on(SYNC_EVENT.RUN_STARTED, ({ trigger, tables }) => {
    console.log(`🔄 ${trigger} sync started:`, tables.join(', '));
  });

  syncEngine.on(SYNC_EVENT.TABLE_SYNCED, ({ table, rowCount }) => {
    console.log(`📤 ${table}: ${rowCount} rows uploaded`);
  });

  syncEngine.on(SYNC_EVENT.TABLE_SKIPPED, ({ table, reason }) => {
    console.log(`⏭️  ${table} skipped (${reason})`);
  });

  syncEngine.on(SYNC_EVENT.RUN_COMPLETED, ({ result }) => {
    console.log(`✅ ${result.trigger} sync completed`);
  });

  syncEngine.on(SYNC_EVENT.RUN_FAILED, ({ result }) => {
    console.log(`❌ ${result.trigger} sync failed:`, result.error?.message);
  });

  // Start timer-driven runs
  console.log('Starting sync engine...');
  if (!(await syncEngine.start())) {
    console.log('Login cancelled');
    return;
  }

  // Manually trigger sync
  console.log('\n🔄 Manually triggering sync...');
  const result = await syncEngine.sync();
  console.log('\n📊 Run status:', result.status);
  console.log(connector.getRows('producto'));

  // Read back what the API now holds
  const products = await syncEngine.fetchRecords(ENTITY.PRODUCT);
  console.log('\n📦 Remote products:', products);

  // Stop the sync engine
  console.log('\n🛑 Stopping sync engine...');
  syncEngine.stop();

  console.log('\n✨ Example completed!');
}

// Run the example
basicExample().catch(console.error);
