import { SessionFactory } from '../model/session';
import { isDuplicateEntry } from '../model/errors';

/**
 * Adds a user unless the username is already taken. Resolves `false` for a
 * duplicate, whether caught by the lookup or by the table's UNIQUE index when
 * two registrations race. The password is stored as given.
 */
export const registerUser = async (sessions: SessionFactory, username: string, password: string): Promise<boolean> => {
  const session = await sessions();
  try {
    const existing = await session.findUser({ username });
    if (existing) return false;

    session.add({ username, password });
    try {
      await session.commit();
    } catch (err) {
      if (isDuplicateEntry(err)) return false;
      throw err;
    }
    return true;
  } finally {
    session.close();
  }
};

// Plain equality on the stored password; unknown user and wrong password look the same.
export const loginUser = async (sessions: SessionFactory, username: string, password: string): Promise<boolean> => {
  const session = await sessions();
  try {
    const user = await session.findUser({ username, password });
    return user !== undefined;
  } finally {
    session.close();
  }
};
