// Dependencies
import express from 'express';
import cors from 'cors';
// Source Files
import createCorsOptions from './config/corsOptions';
import createAuthRouter from './routes/authRouter';
import { SessionFactory } from './model/session';

const createApp = (sessions: SessionFactory, allowedOrigins: string[]) => {
  const app = express();
  app.use(express.json());
  app.use(cors(createCorsOptions(allowedOrigins)));

  app.use('/api/v1/auth', createAuthRouter(sessions));

  return app;
};

export default createApp;
