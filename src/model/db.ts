import { createPool as createMysqlPool, Pool, PoolConnection, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { DatabaseConfig } from '../config';
import { NewUser, User, UserFilter } from './User';
import { Session, SessionFactory } from './session';
import { buildUserQuery, INSERT_USER } from './userQuery';

export interface UserRow {
  id: number;
  username: string;
  password: string;
}

/** The slice of a pooled connection that a session drives. */
export interface SessionConnection {
  selectUsers(sql: string, values: string[]): Promise<UserRow[]>;
  execute(sql: string, values: string[]): Promise<void>;
  beginTransaction(): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  release(): void;
}

export const wrapPoolConnection = (conn: PoolConnection): SessionConnection => ({
  selectUsers: async (sql, values) => {
    const [rows] = await conn.query<(UserRow & RowDataPacket)[]>(sql, values);
    return rows;
  },
  execute: async (sql, values) => {
    await conn.query<ResultSetHeader>(sql, values);
  },
  beginTransaction: () => conn.beginTransaction(),
  commit: () => conn.commit(),
  rollback: () => conn.rollback(),
  release: () => conn.release(),
});

export class MysqlSession implements Session {
  private pending: NewUser[] = [];

  constructor(private readonly conn: SessionConnection) {}

  async findUser(filter: UserFilter): Promise<User | undefined> {
    const { sql, values } = buildUserQuery(filter);
    const rows = await this.conn.selectUsers(sql, values);
    if (rows.length === 0) return undefined;

    const { id, username, password } = rows[0];
    return { id, username, password };
  }

  add(user: NewUser): void {
    this.pending.push(user);
  }

  async commit(): Promise<void> {
    if (this.pending.length === 0) return;
    const staged = this.pending;
    this.pending = [];

    await this.conn.beginTransaction();
    try {
      for (const user of staged) {
        await this.conn.execute(INSERT_USER, [user.username, user.password]);
      }
      await this.conn.commit();
    } catch (err) {
      // The insert error is the one callers act on
      await this.conn.rollback().catch((rollbackErr) => {
        console.error('Rollback error:', rollbackErr);
      });
      throw err;
    }
  }

  close(): void {
    this.conn.release();
  }
}

export const createPool = (config: DatabaseConfig): Pool =>
  createMysqlPool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    waitForConnections: true,
    connectionLimit: config.connectionLimit,
    queueLimit: 0,
  });

export const createSessionFactory =
  (pool: Pool): SessionFactory =>
  async () =>
    new MysqlSession(wrapPoolConnection(await pool.getConnection()));

export const verifyConnection = async (pool: Pool): Promise<void> => {
  const conn = await pool.getConnection();
  console.log('✅ MySQL connection established');
  conn.release();
};
