import express from 'express';
import * as authController from '../controllers/authController';
import { SessionFactory } from '../model/session';

const createAuthRouter = (sessions: SessionFactory) => {
  const authRouter = express.Router();

  authRouter
    .post('/register', authController.handleRegisterUser(sessions))
    .post('/login', authController.handleLoginUser(sessions));

  return authRouter;
};

export default createAuthRouter;
