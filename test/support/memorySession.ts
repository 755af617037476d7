import { NewUser, User, UserFilter } from '../../src/model/User';
import { Session, SessionFactory } from '../../src/model/session';
import { DUPLICATE_ENTRY } from '../../src/model/errors';

class DuplicateEntryError extends Error {
  readonly code = DUPLICATE_ENTRY;
}

/** An in-process stand-in for the `users` table, UNIQUE index included. */
export class MemoryUserStore {
  readonly rows: User[] = [];
  opened = 0;
  closed = 0;
  private nextId = 1;

  insert(user: NewUser): User {
    if (this.rows.some((row) => row.username === user.username)) {
      throw new DuplicateEntryError(`Duplicate entry '${user.username}' for key 'users.users_username_unique'`);
    }
    const row = { id: this.nextId++, ...user };
    this.rows.push(row);
    return row;
  }

  find(filter: UserFilter): User | undefined {
    return this.rows.find(
      (row) => row.username === filter.username && (filter.password === undefined || row.password === filter.password),
    );
  }

  sessions: SessionFactory = async () => {
    this.opened++;
    return new MemorySession(this);
  };
}

export class MemorySession implements Session {
  private pending: NewUser[] = [];

  constructor(private readonly store: MemoryUserStore) {}

  async findUser(filter: UserFilter): Promise<User | undefined> {
    return this.store.find(filter);
  }

  add(user: NewUser): void {
    this.pending.push(user);
  }

  async commit(): Promise<void> {
    const staged = this.pending;
    this.pending = [];
    for (const user of staged) this.store.insert(user);
  }

  close(): void {
    this.store.closed++;
  }
}
