import { describe, it, expect } from 'vitest';
import { isValidServerHost, validateConnectionParams } from '../src/validation';

const server = { host: 'db.local', database: 'tienda', user: 'clerk', password: 'test-secret' };
const exists = () => true;
const missing = () => false;

describe('isValidServerHost', () => {
  it('should accept addresses, names and instances', () => {
    expect(isValidServerHost('192.168.1.10')).toBe(true);
    expect(isValidServerHost('192.168.1.10:1433')).toBe(true);
    expect(isValidServerHost('localhost:5432')).toBe(true);
    expect(isValidServerHost('db.local')).toBe(true);
    expect(isValidServerHost('.\\SQLEXPRESS')).toBe(true);
    expect(isValidServerHost('srv01\\TIENDA_01')).toBe(true);
  });

  it('should reject malformed hosts', () => {
    expect(isValidServerHost('bad host!')).toBe(false);
    expect(isValidServerHost('db..local')).toBe(false);
    expect(isValidServerHost('srv01\\')).toBe(false);
    expect(isValidServerHost('a\\b\\c')).toBe(false);
  });
});

describe('validateConnectionParams', () => {
  it('should accept a complete server form with trimmed values', () => {
    const result = validateConnectionParams({ ...server, host: '  db.local ', connectTimeoutMs: 2000 });

    expect(result).toEqual({
      success: true,
      data: {
        host: 'db.local',
        database: 'tienda',
        user: 'clerk',
        password: 'test-secret',
        integratedSecurity: false,
        connectTimeoutMs: 2000,
      },
    });
  });

  it('should require a host', () => {
    expect(validateConnectionParams({ ...server, host: '   ' })).toEqual({
      success: false,
      message: 'Enter the database host or file path.',
    });
  });

  it('should only check that a database file exists', () => {
    expect(validateConnectionParams({ host: '/data/tienda.db' }, { fileExists: missing })).toEqual({
      success: false,
      message: 'The database file does not exist.',
    });
    expect(validateConnectionParams({ host: '/data/tienda.db' }, { fileExists: exists })).toEqual({
      success: true,
      data: { host: '/data/tienda.db', database: '', user: '', password: '', integratedSecurity: false },
    });
  });

  it('should reject an invalid host', () => {
    const result = validateConnectionParams({ ...server, host: 'bad host!' });

    expect(result.success).toBe(false);
    expect(result.success ? '' : result.message).toMatch(/^Invalid host\./);
  });

  it('should require the database and user names', () => {
    expect(validateConnectionParams({ ...server, database: '' })).toEqual({
      success: false,
      message: 'Enter the database name.',
    });
    expect(validateConnectionParams({ ...server, user: '' })).toEqual({
      success: false,
      message: 'Enter the user name.',
    });
  });

  it('should not require a user under integrated security', () => {
    const result = validateConnectionParams({ ...server, user: '', password: '', integratedSecurity: true });

    expect(result.success).toBe(true);
  });

  it('should restrict names to letters, digits and underscores', () => {
    expect(validateConnectionParams({ ...server, user: 'clerk-1' })).toEqual({
      success: false,
      message: 'Invalid user name. Use letters, digits and underscores only.',
    });
    expect(validateConnectionParams({ ...server, database: 'tienda;drop' })).toEqual({
      success: false,
      message: 'Invalid database name. Use letters, digits and underscores only.',
    });
    expect(validateConnectionParams({ ...server, database: 'tienda_año' }).success).toBe(true);
  });
});
