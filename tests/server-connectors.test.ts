import { describe, it, expect, vi } from 'vitest';
import { MySqlConnector, type MySqlConnect } from '../src/adapters/mysql-connector';
import { PostgresConnector, type PostgresConnect } from '../src/adapters/postgres-connector';
import {
  SqlServerConnector,
  parseSqlServerHost,
  type SqlServerConnect,
} from '../src/adapters/sqlserver-connector';
import { ConnectionError, QueryError, SchemaConfigurationError } from '../src/errors';
import type { ConnectionParams } from '../src/types';
import { FakeSqlSession } from './helpers';

const params: ConnectionParams = {
  host: 'db.local',
  database: 'tienda',
  user: 'clerk',
  password: 'test-secret',
  integratedSecurity: false,
};

const rows = [
  { Id: 1, Nombre: 'Cafe', IsSynced: 0 },
  { Id: 2, Nombre: 'Te', IsSynced: null },
];

function createSession(flagType: string = 'int', columns: string[] = ['Id', 'Nombre', 'IsSynced']) {
  return new FakeSqlSession(sql => {
    const normalized = sql.toLowerCase();
    if (normalized.includes('information_schema.columns')) {
      return columns.map(name => ({ name, type: name === 'IsSynced' ? flagType : 'varchar' }));
    }
    if (normalized.includes('information_schema.tables')) {
      return [{ name: 'cliente' }, { name: 'producto' }];
    }
    return rows;
  });
}

function lastStatement(session: FakeSqlSession): string | undefined {
  return session.statements[session.statements.length - 1]?.sql;
}

describe('MySqlConnector', () => {
  it('should open with the parsed host and defaults', async () => {
    const session = createSession();
    const connect = vi.fn<MySqlConnect>(async () => session);
    const connector = new MySqlConnector({ ...params, host: 'db.local:3307' }, connect);

    await connector.open();
    await connector.open();

    expect(connect).toHaveBeenCalledTimes(1);
    expect(connect).toHaveBeenCalledWith({
      host: 'db.local',
      port: 3307,
      database: 'tienda',
      user: 'clerk',
      password: 'test-secret',
      connectTimeout: 5000,
    });
  });

  it('should translate open failures', async () => {
    const connector = new MySqlConnector(params, async () => {
      throw new Error("Access denied for user 'clerk'");
    });

    const error = await connector.open().catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({ message: "MySQL: Access denied for user 'clerk'", code: 'CONNECTION_FAILED' });
  });

  it('should list tables and columns', async () => {
    const connector = new MySqlConnector(params, async () => createSession());

    expect(await connector.listTables()).toEqual(['cliente', 'producto']);
    expect(await connector.listColumns('producto')).toEqual(['Id', 'Nombre', 'IsSynced']);
  });

  it('should filter unsynced rows with backtick quoting', async () => {
    const session = createSession();
    const connector = new MySqlConnector(params, async () => session);

    const batch = await connector.readUnsynced('producto', ['Id', 'Nombre']);

    expect(lastStatement(session)).toBe('SELECT `Id`, `Nombre` FROM `producto` WHERE COALESCE(`IsSynced`, 0) = 0');
    expect(batch).toEqual({ table: 'producto', columns: ['Id', 'Nombre'], rows });
  });

  it('should mark rows inside one transaction', async () => {
    const session = createSession();
    const connector = new MySqlConnector(params, async () => session);

    await connector.markSynced('producto', { table: 'producto', columns: ['Id', 'Nombre'], rows });

    const updates = session.statements.filter(statement => statement.sql.startsWith('UPDATE'));
    expect(updates).toEqual([
      { sql: 'UPDATE `producto` SET `IsSynced` = 1 WHERE `Id` = ?', params: [1], inTransaction: true },
      { sql: 'UPDATE `producto` SET `IsSynced` = 1 WHERE `Id` = ?', params: [2], inTransaction: true },
    ]);
    expect(session.commits).toBe(1);
  });

  it('should roll back and report a failed update', async () => {
    const session = createSession();
    session.failExecuteOn = values => values[0] === 2;
    const connector = new MySqlConnector(params, async () => session);

    await expect(
      connector.markSynced('producto', { table: 'producto', columns: ['Id'], rows }),
    ).rejects.toThrow(new QueryError(connector.engine, 'producto', 'deadlock detected'));
    expect(session.rollbacks).toBe(1);
    expect(session.commits).toBe(0);
  });

  it('should quote hostile identifiers', async () => {
    const session = createSession();
    const connector = new MySqlConnector(params, async () => session);

    await connector.readTable('a`b', ['c`d']);

    expect(lastStatement(session)).toBe('SELECT `c``d` FROM `a``b`');
  });

  it('should close the session', async () => {
    const session = createSession();
    const connector = new MySqlConnector(params, async () => session);

    await connector.open();
    await connector.close();
    await connector.close();

    expect(session.closed).toBe(true);
  });
});

describe('PostgresConnector', () => {
  it('should open on the default port', async () => {
    const connect = vi.fn<PostgresConnect>(async () => createSession());
    await new PostgresConnector(params, connect).open();

    expect(connect).toHaveBeenCalledWith({
      host: 'db.local',
      port: 5432,
      database: 'tienda',
      user: 'clerk',
      password: 'test-secret',
      connectionTimeoutMillis: 5000,
    });
  });

  it('should use boolean comparisons for boolean flags', async () => {
    const session = createSession('boolean');
    const connector = new PostgresConnector(params, async () => session);

    await connector.readUnsynced('producto', []);
    expect(lastStatement(session)).toBe('SELECT * FROM "producto" WHERE "IsSynced" IS NOT TRUE');

    await connector.markSynced('producto', { table: 'producto', columns: [], rows: rows.slice(0, 1) });
    expect(lastStatement(session)).toBe('UPDATE "producto" SET "IsSynced" = TRUE WHERE "Id" = $1');
  });

  it('should use numeric comparisons for integer flags', async () => {
    const session = createSession('smallint');
    const connector = new PostgresConnector(params, async () => session);

    await connector.readUnsynced('producto', ['Nombre']);
    expect(lastStatement(session)).toBe('SELECT "Nombre" FROM "producto" WHERE COALESCE("IsSynced", 0) = 0');

    await connector.markSynced('producto', { table: 'producto', columns: [], rows });
    expect(lastStatement(session)).toBe('UPDATE "producto" SET "IsSynced" = 1 WHERE "Id" = $1');
  });

  it('should read every row of a table without a flag', async () => {
    const session = createSession('int', ['Id', 'Nombre']);
    const connector = new PostgresConnector(params, async () => session);

    await connector.readUnsynced('producto', []);
    expect(lastStatement(session)).toBe('SELECT * FROM "producto"');

    await connector.markSynced('producto', { table: 'producto', columns: [], rows });
    expect(session.statements.some(statement => statement.sql.startsWith('UPDATE'))).toBe(false);
  });

  it('should reject a flag without an identity column', async () => {
    const connector = new PostgresConnector(params, async () => createSession('int', ['Nombre', 'IsSynced']));

    await expect(connector.readUnsynced('producto', [])).rejects.toBeInstanceOf(SchemaConfigurationError);
  });
});

describe('SqlServerConnector', () => {
  it('should parse server, port and instance names', () => {
    expect(parseSqlServerHost('srv')).toEqual({ server: 'srv' });
    expect(parseSqlServerHost('srv:1444')).toEqual({ server: 'srv', port: 1444 });
    expect(parseSqlServerHost('srv\\SQLEXPRESS')).toEqual({ server: 'srv', instanceName: 'SQLEXPRESS' });
    expect(parseSqlServerHost('.\\SQLEXPRESS')).toEqual({ server: 'localhost', instanceName: 'SQLEXPRESS' });
  });

  it('should send no user or password with integrated security', async () => {
    const connect = vi.fn<SqlServerConnect>(async () => createSession());
    const connector = new SqlServerConnector(
      { ...params, host: '.\\SQLEXPRESS', integratedSecurity: true },
      connect,
    );

    await connector.open();

    expect(connect).toHaveBeenCalledWith({
      server: 'localhost',
      instanceName: 'SQLEXPRESS',
      database: 'tienda',
      trustedConnection: true,
      connectionTimeout: 5000,
    });
  });

  it('should send the login with SQL authentication', async () => {
    const connect = vi.fn<SqlServerConnect>(async () => createSession());
    await new SqlServerConnector({ ...params, connectTimeoutMs: 2000 }, connect).open();

    expect(connect).toHaveBeenCalledWith({
      server: 'db.local',
      database: 'tienda',
      user: 'clerk',
      password: 'test-secret',
      trustedConnection: false,
      connectionTimeout: 2000,
    });
  });

  it('should use bracket quoting and named parameters', async () => {
    const session = createSession();
    const connector = new SqlServerConnector(params, async () => session);

    await connector.readUnsynced('producto', []);
    expect(lastStatement(session)).toBe('SELECT * FROM [producto] WHERE COALESCE([IsSynced], 0) = 0');

    await connector.markSynced('producto', { table: 'producto', columns: [], rows });
    expect(lastStatement(session)).toBe('UPDATE [producto] SET [IsSynced] = 1 WHERE [Id] = @p0');

    await connector.readTable('a]b', []);
    expect(lastStatement(session)).toBe('SELECT * FROM [a]]b]');
  });

  it('should report query failures with the engine label', async () => {
    const session = new FakeSqlSession(() => {
      throw new Error("Invalid object name 'producto'");
    });
    const connector = new SqlServerConnector(params, async () => session);

    await expect(connector.listTables()).rejects.toThrow(
      "SQL Server: INFORMATION_SCHEMA: Invalid object name 'producto'",
    );
  });
});
