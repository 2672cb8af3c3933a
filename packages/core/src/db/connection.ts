/**
 * @module db/connection
 * SQL Server connection pool management for the shell.
 *
 * Uses a single-connection pool: every batch, transaction and introspection
 * query of a session runs on the same server connection, so `use <db>`,
 * `set` options and open transactions carry over from one batch to the next.
 */

import * as sql from 'mssql';
import { DatabaseConfig } from './types';
import { ConnectionError } from '../core/errors';

/**
 * Builds the `mssql` configuration for a database config.
 */
export function BuildMssqlConfig(config: DatabaseConfig): sql.config {
  const options = config.Options ?? {};
  const mssqlConfig: sql.config = {
    server: config.Server,
    port: config.Port ?? 1433,
    user: config.User,
    password: config.Password,
    database: config.Database,
    options: {
      encrypt: options.Encrypt ?? false,
      trustServerCertificate: options.TrustServerCertificate ?? true,
      enableArithAbort: true,
    },
    pool: {
      max: 1,
      min: 1,
    },
    requestTimeout: options.RequestTimeout ?? 0,
    connectionTimeout: options.ConnectionTimeout ?? 30_000,
  };

  if (mssqlConfig.options) {
    if (options.ClientHostname) {
      mssqlConfig.options.workstationId = options.ClientHostname;
    }
    if (options.PacketSize) {
      mssqlConfig.options.packetSize = options.PacketSize;
    }
    if (options.Language) {
      mssqlConfig.options.language = options.Language;
    }
  }
  return mssqlConfig;
}

/**
 * Manages the SQL Server connection pool of one shell session.
 */
export class ConnectionManager {
  private pool: sql.ConnectionPool | null = null;
  private readonly config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  /**
   * Opens the connection pool. Must be called before executing any SQL.
   * Safe to call multiple times — subsequent calls are no-ops if already connected.
   * @throws ConnectionError if the server cannot be reached or the login fails
   */
  async Connect(): Promise<void> {
    if (this.pool?.connected) {
      return;
    }

    const pool = new sql.ConnectionPool(BuildMssqlConfig(this.config));
    try {
      await pool.connect();
    } catch (err) {
      throw new ConnectionError(
        `Failed to connect to ${this.config.Server}:${this.config.Port ?? 1433}: ${
          err instanceof Error ? err.message : String(err)
        }`,
        err instanceof Error ? err : undefined
      );
    }
    this.pool = pool;
  }

  /**
   * Returns the active connection pool.
   * @throws Error if the pool has not been connected yet.
   */
  GetPool(): sql.ConnectionPool {
    if (!this.pool?.connected) {
      throw new Error(
        'Connection pool is not connected. Call Connect() before accessing the pool.'
      );
    }
    return this.pool;
  }

  /**
   * Closes the connection pool and releases all resources.
   * Safe to call multiple times.
   */
  async Disconnect(): Promise<void> {
    if (this.pool) {
      await this.pool.close();
      this.pool = null;
    }
  }

  /**
   * Returns true if the connection pool is currently connected.
   */
  get IsConnected(): boolean {
    return this.pool?.connected ?? false;
  }
}
