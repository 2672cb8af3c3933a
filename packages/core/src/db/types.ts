/**
 * @module db/types
 * Database connection configuration types for the shell.
 */

/**
 * Configuration for connecting to a SQL Server instance.
 * Maps directly to the `mssql` package connection options.
 */
export interface DatabaseConfig {
  /** SQL Server hostname or IP address */
  Server: string;

  /** SQL Server port. Defaults to 1433 */
  Port?: number;

  /** Database to use after login. Defaults to "master" */
  Database: string;

  /** SQL Server login username */
  User: string;

  /** SQL Server login password */
  Password: string;

  /** Additional connection options */
  Options?: DatabaseConnectionOptions;
}

/**
 * Extended connection options for fine-tuning SQL Server connectivity.
 */
export interface DatabaseConnectionOptions {
  /** Whether to encrypt the connection. Defaults to false */
  Encrypt?: boolean;

  /** Whether to trust self-signed certificates. Defaults to true */
  TrustServerCertificate?: boolean;

  /** Client host name reported to the server (workstation id) */
  ClientHostname?: string;

  /** Network packet size in bytes. Zero or absent lets the server decide */
  PacketSize?: number;

  /** Session language (locale) name */
  Language?: string;

  /**
   * Per-batch timeout in milliseconds. Zero disables the timeout, leaving
   * the interrupt key as the only way to stop a running batch.
   */
  RequestTimeout?: number;

  /** Login timeout in milliseconds. Defaults to 30000 (30 seconds) */
  ConnectionTimeout?: number;
}
