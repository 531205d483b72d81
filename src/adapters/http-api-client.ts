/**
 * HTTP client for the retail REST API
 */

import { z } from 'zod';
import type { ApiClient, FetchResult, UploadResult } from '../interfaces';
import type { Credentials, WireRecord } from '../types';
import { AuthenticationError, TransportError, errorMessage } from '../errors';

export interface HttpApiClientConfig {
  baseUrl: string;
  timeout?: number;
  headers?: Record<string, string>;

  // Endpoint customization
  endpoints?: {
    login?: string; // Default: '/api/Auth/login'
  };
}

const loginResponseSchema = z.object({
  token: z.string().min(1),
});

/**
 * API client that talks to the remote service over `fetch`
 */
export class HttpApiClient implements ApiClient {
  private readonly config: {
    baseUrl: string;
    timeout: number;
    headers: Record<string, string>;
    endpoints: {
      login: string;
    };
  };

  constructor(config: HttpApiClientConfig) {
    this.config = {
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
      timeout: config.timeout ?? 30000,
      headers: config.headers ?? {},
      endpoints: {
        login: config.endpoints?.login ?? '/api/Auth/login',
      },
    };
  }

  async login(credentials: Credentials): Promise<string> {
    const { ok, status, body } = await this.request(
      'POST',
      this.config.endpoints.login,
      async response => ({
        ok: response.ok,
        status: response.status,
        body: response.ok ? await this.readJson(response) : null,
      }),
      { username: credentials.username, password: credentials.password },
    );

    if (!ok) {
      throw new AuthenticationError(undefined, status);
    }

    const parsed = loginResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new AuthenticationError('Login response did not contain a token', status);
    }

    return parsed.data.token;
  }

  async upload(path: string, records: WireRecord[], token: string): Promise<UploadResult> {
    try {
      return await this.request(
        'POST',
        path,
        async (response): Promise<UploadResult> => {
          if (response.ok) {
            return { success: true, status: response.status };
          }
          const detail = await response.text();
          return {
            success: false,
            status: response.status,
            error: detail || `${response.status} ${response.statusText}`,
          };
        },
        records,
        token,
      );
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }

  async fetchRecords(path: string, token: string): Promise<FetchResult> {
    try {
      return await this.request(
        'GET',
        path,
        async (response): Promise<FetchResult> => {
          if (!response.ok) {
            return {
              success: false,
              records: [],
              status: response.status,
              error: `${response.status} ${response.statusText}`,
            };
          }

          const body = await this.readJson(response);
          if (!Array.isArray(body)) {
            return { success: false, records: [], status: response.status, error: 'Expected a JSON array' };
          }

          return { success: true, records: body, status: response.status };
        },
        undefined,
        token,
      );
    } catch (error) {
      return { success: false, records: [], error: errorMessage(error) };
    }
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      const body: unknown = await response.json();
      return body;
    } catch {
      return null;
    }
  }

  /**
   * Send a request and read its response; the timeout covers the body as well as the headers
   */
  private async request<T>(
    method: string,
    path: string,
    read: (response: Response) => Promise<T>,
    body?: unknown,
    token?: string,
  ): Promise<T> {
    const url = `${this.config.baseUrl}${path}`;

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
      ...this.config.headers,
    };

    if (token) {
      headers['Authorization'] = `Bearer ${token}`;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.config.timeout);
    const timedOut = () => `timed out after ${this.config.timeout}ms`;

    try {
      const requestInit: RequestInit = {
        method,
        headers,
        signal: controller.signal,
      };

      if (body !== undefined) {
        requestInit.body = JSON.stringify(body);
      }

      const response = await fetch(url, requestInit);
      const result = await read(response);
      if (controller.signal.aborted) {
        throw new TransportError(url, timedOut());
      }
      return result;
    } catch (error) {
      if (error instanceof TransportError) throw error;
      const detail = controller.signal.aborted ? timedOut() : errorMessage(error);
      throw new TransportError(url, detail, { cause: error });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Mock API client for testing and development
 */
export class MockApiClient implements ApiClient {
  private readonly users: Map<string, string>;
  private readonly records = new Map<string, unknown[]>();
  private readonly failingPaths = new Map<string, string>();
  private readonly uploads: Array<{ path: string; records: WireRecord[]; token: string }> = [];
  private readonly tokens = new Set<string>();
  private issued = 0;
  private isConnected: boolean;
  loginCount = 0;

  constructor(
    options: {
      users?: Record<string, string>; // username -> password
      records?: Record<string, unknown[]>; // path -> stored records
      isConnected?: boolean;
    } = {},
  ) {
    this.users = new Map(Object.entries(options.users ?? {}));
    for (const [path, stored] of Object.entries(options.records ?? {})) {
      this.records.set(path, [...stored]);
    }
    this.isConnected = options.isConnected ?? true;
  }

  async login(credentials: Credentials): Promise<string> {
    this.loginCount++;
    if (!this.isConnected) {
      throw new TransportError('mock://login', 'Network error or server unavailable');
    }
    if (this.users.get(credentials.username) !== credentials.password) {
      throw new AuthenticationError(undefined, 401);
    }

    const token = `token-${++this.issued}`;
    this.tokens.add(token);
    return token;
  }

  async upload(path: string, records: WireRecord[], token: string): Promise<UploadResult> {
    const rejected = this.reject(path, token);
    if (rejected) return rejected;

    this.uploads.push({ path, records: records.map(record => ({ ...record })), token });
    this.records.set(path, [...(this.records.get(path) ?? []), ...records]);
    return { success: true, status: 200 };
  }

  async fetchRecords(path: string, token: string): Promise<FetchResult> {
    const rejected = this.reject(path, token);
    if (rejected) return { ...rejected, records: [] };

    return { success: true, status: 200, records: [...(this.records.get(path) ?? [])] };
  }

  // Test utilities
  setUser(username: string, password: string): void {
    this.users.set(username, password);
  }

  setConnected(connected: boolean): void {
    this.isConnected = connected;
  }

  failPath(path: string, error: string = 'Internal Server Error'): void {
    this.failingPaths.set(path, error);
  }

  revokeTokens(): void {
    this.tokens.clear();
  }

  getUploads(): Array<{ path: string; records: WireRecord[]; token: string }> {
    return [...this.uploads];
  }

  private reject(path: string, token: string): UploadResult | null {
    if (!this.isConnected) {
      return { success: false, error: 'Network error or server unavailable' };
    }
    if (!this.tokens.has(token)) {
      return { success: false, status: 401, error: 'Unauthorized' };
    }
    const failure = this.failingPaths.get(path);
    if (failure !== undefined) {
      return { success: false, status: 500, error: failure };
    }
    return null;
  }
}
