import { vi } from 'vitest';
import type { Logger } from '../src/logger';
import type { CredentialProvider, CredentialRequest, SqlExecutor, SqlSession } from '../src/interfaces';
import type { Credentials, SqlParam } from '../src/types';

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

/**
 * Credential provider that hands out a scripted sequence of answers
 */
export class ScriptedCredentials implements CredentialProvider {
  readonly requests: CredentialRequest[] = [];

  constructor(private readonly answers: Array<Credentials | null>) {}

  async requestCredentials(request: CredentialRequest): Promise<Credentials | null> {
    this.requests.push(request);
    return this.answers.shift() ?? null;
  }
}

export interface RecordedStatement {
  sql: string;
  params: SqlParam[];
  inTransaction: boolean;
}

type Responder = (sql: string, params: readonly SqlParam[]) => Record<string, unknown>[];

/**
 * In-process stand-in for a driver connection
 */
export class FakeSqlSession implements SqlSession {
  readonly statements: RecordedStatement[] = [];
  commits = 0;
  rollbacks = 0;
  closed = false;
  failExecuteOn: ((params: readonly SqlParam[]) => boolean) | null = null;

  constructor(private readonly respond: Responder = () => []) {}

  query(sql: string, params: readonly SqlParam[] = []): Promise<Record<string, unknown>[]> {
    return this.executor(false).query(sql, params);
  }

  execute(sql: string, params: readonly SqlParam[] = []): Promise<number> {
    return this.executor(false).execute(sql, params);
  }

  async transaction<R>(work: (tx: SqlExecutor) => Promise<R>): Promise<R> {
    try {
      const result = await work(this.executor(true));
      this.commits++;
      return result;
    } catch (error) {
      this.rollbacks++;
      throw error;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private executor(inTransaction: boolean): SqlExecutor {
    return {
      query: async (sql, params = []) => {
        this.statements.push({ sql, params: [...params], inTransaction });
        return this.respond(sql, params);
      },
      execute: async (sql, params = []) => {
        this.statements.push({ sql, params: [...params], inTransaction });
        if (this.failExecuteOn?.(params)) {
          throw new Error('deadlock detected');
        }
        return 1;
      },
    };
  }
}
