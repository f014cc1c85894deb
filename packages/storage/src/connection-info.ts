/**
 * Connection strings
 * ==================
 * Parses `DB_URL`-style connection strings into a closed set of backend kinds.
 *
 * Accepted forms:
 * - `postgres://`, `postgresql://`, `postgressql://` (optional `+driver` suffix)
 * - `mysql://` (optional `+driver` suffix)
 * - `mongodb://`, `mongodb+srv://`
 * - `sqlite:///relative.db`, `sqlite:////absolute/path.db`, `sqlite://` (in memory)
 *
 * A `DATABASE_NAME=<name>` token anywhere in the query string supplies the
 * database name when the path is empty, and is removed from the normalised URL.
 */

import { ConfigurationError } from '@fxledger/core';
import { SQLITE_MEMORY } from './sqlite/sqlite-driver.js';

export enum DatabaseBackendKind {
  SQLITE = 'sqlite',
  POSTGRES = 'postgres',
  MYSQL = 'mysql',
  MONGODB = 'mongodb',
}

export interface DatabaseConnectionInfo {
  backend: DatabaseBackendKind;
  /** Normalised URL handed to the driver */
  url: string;
  /** Database name; the file path for SQLite */
  name?: string;
  username?: string;
  password?: string;
  host?: string;
  port?: number;
}

const SCHEME_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):\/\/(.*)$/s;
const DATABASE_NAME_PATTERN = /DATABASE_NAME=([^&]*)/;

const SCHEME_ALIASES: Readonly<Record<string, DatabaseBackendKind>> = {
  postgres: DatabaseBackendKind.POSTGRES,
  postgresql: DatabaseBackendKind.POSTGRES,
  postgressql: DatabaseBackendKind.POSTGRES,
  mysql: DatabaseBackendKind.MYSQL,
  sqlite: DatabaseBackendKind.SQLITE,
  mongodb: DatabaseBackendKind.MONGODB,
};

/**
 * Map a URL scheme (with or without `+driver`) to a backend kind
 */
export function backendKindFromScheme(scheme: string): DatabaseBackendKind {
  const base = scheme.toLowerCase().split('+')[0] ?? '';
  const kind = SCHEME_ALIASES[base];
  if (kind === undefined) {
    throw new ConfigurationError(`Unsupported database scheme: ${scheme}`, 'DB_URL', { scheme });
  }
  return kind;
}

function normalisedScheme(kind: DatabaseBackendKind, scheme: string): string {
  switch (kind) {
    case DatabaseBackendKind.POSTGRES:
      return 'postgresql';
    case DatabaseBackendKind.MYSQL:
      return 'mysql';
    case DatabaseBackendKind.SQLITE:
      return 'sqlite';
    case DatabaseBackendKind.MONGODB:
      return scheme.toLowerCase() === 'mongodb+srv' ? 'mongodb+srv' : 'mongodb';
  }
}

function extractDatabaseName(query: string): { query: string; databaseName?: string } {
  const match = DATABASE_NAME_PATTERN.exec(query);
  if (!match) {
    return { query };
  }
  const cleaned = query
    .replace(match[0], '')
    .split('&')
    .filter((part) => part.length > 0)
    .join('&');
  const databaseName = decodeURIComponent(match[1] ?? '');
  return { query: cleaned, databaseName: databaseName || undefined };
}

function parseAuthority(authority: string): Pick<DatabaseConnectionInfo, 'username' | 'password' | 'host' | 'port'> {
  const at = authority.lastIndexOf('@');
  const credentials = at >= 0 ? authority.slice(0, at) : '';
  const hostPart = at >= 0 ? authority.slice(at + 1) : authority;

  const parsed: Pick<DatabaseConnectionInfo, 'username' | 'password' | 'host' | 'port'> = {};
  if (credentials) {
    const colon = credentials.indexOf(':');
    parsed.username = decodeURIComponent(colon >= 0 ? credentials.slice(0, colon) : credentials);
    if (colon >= 0) {
      parsed.password = decodeURIComponent(credentials.slice(colon + 1));
    }
  }

  // Replica-set host lists are passed through untouched
  const portMatch = hostPart.includes(',') ? null : /^(.*):(\d+)$/.exec(hostPart);
  if (portMatch) {
    parsed.host = portMatch[1];
    parsed.port = Number(portMatch[2]);
  } else if (hostPart) {
    parsed.host = hostPart;
  }
  return parsed;
}

function parseSqlite(rest: string): DatabaseConnectionInfo {
  const [pathPart = ''] = rest.split('?');
  let filename: string;
  if (pathPart === '' || pathPart === '/' || pathPart === `/${SQLITE_MEMORY}` || pathPart === SQLITE_MEMORY) {
    filename = SQLITE_MEMORY;
  } else if (pathPart.startsWith('/')) {
    // sqlite:///relative.db keeps one slash out; sqlite:////abs.db keeps one in
    filename = decodeURIComponent(pathPart.slice(1));
  } else {
    filename = decodeURIComponent(pathPart);
  }
  return {
    backend: DatabaseBackendKind.SQLITE,
    url: `sqlite:///${filename}`,
    name: filename,
  };
}

/**
 * Parse a connection string. Throws ConfigurationError on anything malformed.
 */
export function parseConnectionUrl(url: string): DatabaseConnectionInfo {
  const trimmed = url.trim();
  const match = SCHEME_PATTERN.exec(trimmed);
  if (!match) {
    throw new ConfigurationError('DB_URL must include a scheme (e.g. postgresql://)', 'DB_URL');
  }
  const scheme = match[1] ?? '';
  const rest = match[2] ?? '';
  const backend = backendKindFromScheme(scheme);

  if (backend === DatabaseBackendKind.SQLITE) {
    return parseSqlite(rest);
  }

  const queryStart = rest.indexOf('?');
  const beforeQuery = queryStart >= 0 ? rest.slice(0, queryStart) : rest;
  const rawQuery = queryStart >= 0 ? rest.slice(queryStart + 1) : '';
  const slash = beforeQuery.indexOf('/');
  const authority = slash >= 0 ? beforeQuery.slice(0, slash) : beforeQuery;
  const pathName = slash >= 0 ? beforeQuery.slice(slash + 1) : '';

  if (!authority) {
    throw new ConfigurationError('DB_URL must include a host', 'DB_URL');
  }

  const { query, databaseName } = extractDatabaseName(rawQuery);
  const name = decodeURIComponent(pathName) || databaseName;

  if (backend === DatabaseBackendKind.MONGODB && !name) {
    throw new ConfigurationError('MongoDB connection URI must include a database name', 'DB_URL');
  }

  const path = name ? `/${pathName || encodeURIComponent(name)}` : query ? '/' : '';
  return {
    backend,
    url: `${normalisedScheme(backend, scheme)}://${authority}${path}${query ? `?${query}` : ''}`,
    name,
    ...parseAuthority(authority),
  };
}
