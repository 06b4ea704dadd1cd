import express, { Application } from 'express';
import path from 'path';
import { fileURLToPath } from 'url';
import cookieParser from 'cookie-parser';
import logger from 'morgan';
import cors from 'cors';

import indexRouter from './routes/index';
import { createAuthRouter } from './routes/auth';
import { createBlogRouter } from './routes/blog';
import { createAdminRouter } from './routes/admin';
import { createApiRouter } from './routes/api';
import type { Auth } from './auth';
import type { AppConfig } from './config';
import type { Services } from './services/index';

import { errorHandler, notFoundHandler, requestLogger } from './middleware/auth';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export interface AppOptions {
  auth: Auth;
  services: Services;
  config: AppConfig;
}

export function createApp({ auth, services, config }: AppOptions): Application {
  const app: Application = express();

  // CORS configuration
  app.use(cors({
    origin: [config.baseUrl, config.frontendUrl].filter((url): url is string => Boolean(url)),
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Cookie'],
  }));

  if (config.env !== 'test') {
    app.use(logger('dev'));
    app.use(requestLogger);
  }

  // Better Auth parses its own bodies
  app.use('/', createAuthRouter(auth));

  // Basic middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(cookieParser());
  app.use(express.static(path.join(__dirname, '..', 'public')));

  // Routes
  app.use('/', indexRouter);
  app.use('/blog', createBlogRouter(services.postService));
  app.use('/admin', createAdminRouter(auth, services));
  app.use('/api', createApiRouter(auth, services));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
