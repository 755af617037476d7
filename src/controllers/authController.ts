import express from 'express';
import { SessionFactory } from '../model/session';
import { loginUser, registerUser } from '../services/userDirectory';

interface Credentials {
  username: string;
  password: string;
}

const readCredentials = (body: unknown): Credentials | undefined => {
  if (typeof body !== 'object' || body === null) return undefined;
  if (!('username' in body) || !('password' in body)) return undefined;

  const { username, password } = body;
  if (typeof username !== 'string' || typeof password !== 'string') return undefined;
  return { username, password };
};

const handleRegisterUser = (sessions: SessionFactory) => async (req: express.Request, res: express.Response) => {
  const credentials = readCredentials(req.body);
  if (!credentials) {
    res.status(400).json({ error: 'Username and password are required' });
    return;
  }

  try {
    const registered = await registerUser(sessions, credentials.username, credentials.password);
    if (!registered) {
      res.status(409).json({ error: 'Username taken' });
      return;
    }

    res.status(201).json({ error: null });
  } catch (err) {
    console.error('Registration error:', err);
    res.status(500).json({ error: 'Server error during registration' });
  }
};

const handleLoginUser = (sessions: SessionFactory) => async (req: express.Request, res: express.Response) => {
  const credentials = readCredentials(req.body);
  if (!credentials) {
    res.status(400).json({ error: 'Username and password are required' });
    return;
  }

  try {
    const authenticated = await loginUser(sessions, credentials.username, credentials.password);
    if (!authenticated) {
      res.status(401).json({ error: 'Invalid credentials' });
      return;
    }

    res.status(200).json({ error: null });
  } catch (err) {
    console.error('Login error:', err);
    res.status(500).json({ error: 'Server error while logging in' });
  }
};

export { handleRegisterUser, handleLoginUser };
