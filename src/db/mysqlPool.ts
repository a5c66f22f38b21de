import mysql from 'mysql2/promise';
import type { Pool as MysqlPool } from 'mysql2/promise';

export interface MysqlPoolOptions {
  url: string;
  ssl: boolean;
  sslRejectUnauthorized: boolean;
}

export function mysqlConfigFromUrl(opts: MysqlPoolOptions) {
  const url = new URL(opts.url);
  const database = url.pathname.replace(/^\//, '');

  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : 3306,
    user: decodeURIComponent(url.username),
    password: decodeURIComponent(url.password),
    database,
    ssl: opts.ssl
      ? {
          rejectUnauthorized: opts.sslRejectUnauthorized
        }
      : undefined
  };
}

export function createMysqlPool(opts: MysqlPoolOptions): MysqlPool {
  return mysql.createPool({
    ...mysqlConfigFromUrl(opts),
    connectionLimit: 2,
    waitForConnections: true,
    enableKeepAlive: true
  });
}
