/**
 * Checks connection form input before anything is opened
 */

import { existsSync } from 'node:fs';
import { isIP } from 'node:net';
import { z } from 'zod';
import type { ConnectionParams } from './types';
import { isFileDatabase } from './resolver';
import { splitHostPort } from './utils';

const NAME_PATTERN = /^[\p{L}\p{N}_]+$/u;
const INSTANCE_PATTERN = /^[\p{L}\p{N}_-]+$/u;
const LABEL_PATTERN = /^[\p{L}\p{N}-]{1,63}$/u;

function isDnsOrIp(host: string): boolean {
  if (host === '.' || isIP(host) !== 0) return true;
  return host.split('.').every(label => LABEL_PATTERN.test(label));
}

/**
 * IP address, `localhost`, a DNS name, `.` or `server\instance`, optionally with `:port`
 */
export function isValidServerHost(host: string): boolean {
  if (isIP(host) !== 0) return true;

  if (host.includes('\\')) {
    const parts = host.split('\\').map(part => part.trim());
    const [server = '', instance = ''] = parts;
    if (parts.length !== 2 || server === '' || instance === '') return false;
    return (server === '.' || isDnsOrIp(server)) && INSTANCE_PATTERN.test(instance);
  }

  const { host: name } = splitHostPort(host);
  return name.toLowerCase() === 'localhost' || isDnsOrIp(name);
}

const connectionInputSchema = z.object({
  host: z.string().trim(),
  database: z.string().trim().default(''),
  user: z.string().trim().default(''),
  password: z.string().default(''),
  integratedSecurity: z.boolean().default(false),
  connectTimeoutMs: z.number().int().positive().optional(),
});

export type ConnectionInput = z.input<typeof connectionInputSchema>;

export type ValidationResult = { success: true; data: ConnectionParams } | { success: false; message: string };

export interface ValidationOptions {
  fileExists?: (path: string) => boolean;
}

/**
 * Validate connection input the way the login form does
 */
export function validateConnectionParams(input: ConnectionInput, options: ValidationOptions = {}): ValidationResult {
  const parsed = connectionInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { success: false, message: issue ? `${issue.path.join('.')}: ${issue.message}` : 'Invalid input' };
  }

  const { connectTimeoutMs, ...values } = parsed.data;
  const data: ConnectionParams = connectTimeoutMs === undefined ? values : { ...values, connectTimeoutMs };
  const isFile = isFileDatabase(data.host);

  if (data.host === '') {
    return { success: false, message: 'Enter the database host or file path.' };
  }

  if (isFile) {
    const fileExists = options.fileExists ?? existsSync;
    if (!fileExists(data.host)) {
      return { success: false, message: 'The database file does not exist.' };
    }
    return { success: true, data };
  }

  if (!isValidServerHost(data.host)) {
    return {
      success: false,
      message:
        'Invalid host. Use an IP address, a DNS name, a SQL Server instance (for example .\\SQLEXPRESS) or a database file path.',
    };
  }

  if (data.database === '') {
    return { success: false, message: 'Enter the database name.' };
  }

  if (!data.integratedSecurity) {
    if (data.user === '') {
      return { success: false, message: 'Enter the user name.' };
    }
    if (!NAME_PATTERN.test(data.user)) {
      return { success: false, message: 'Invalid user name. Use letters, digits and underscores only.' };
    }
  }

  if (!NAME_PATTERN.test(data.database)) {
    return { success: false, message: 'Invalid database name. Use letters, digits and underscores only.' };
  }

  return { success: true, data };
}
