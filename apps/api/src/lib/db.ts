// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import mysql, { type Pool } from "mysql2/promise";
import { getAppEnv } from "./env";

const globalForDb = globalThis as typeof globalThis & {
  __vinstockApiDbPool?: Pool;
};

export function getDbPool(): Pool {
  if (globalForDb.__vinstockApiDbPool) {
    return globalForDb.__vinstockApiDbPool;
  }

  const env = getAppEnv();
  const pool = mysql.createPool({
    host: env.db.host,
    port: env.db.port,
    user: env.db.user,
    password: env.db.password,
    database: env.db.database,
    waitForConnections: true,
    connectionLimit: env.db.connectionLimit,
    queueLimit: 0,
    timezone: "Z",
    dateStrings: ["DATE"]
  });

  globalForDb.__vinstockApiDbPool = pool;
  return pool;
}
