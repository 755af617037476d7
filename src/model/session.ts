import { NewUser, User, UserFilter } from './User';

/**
 * A handle on the database for a single unit of work. Inserts staged with
 * `add` are written by `commit`; `close` hands the connection back.
 */
export interface Session {
  findUser(filter: UserFilter): Promise<User | undefined>;
  add(user: NewUser): void;
  commit(): Promise<void>;
  close(): void;
}

export type SessionFactory = () => Promise<Session>;
