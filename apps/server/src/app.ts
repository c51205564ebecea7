import express from 'express';
import cors from 'cors';
import type { Loader } from './services/loader';
import type { ImageStore } from './services/image-store';
import { sampleRoutes } from './routes/samples';

export interface AppDeps {
  loader: Loader;
  imageStore: ImageStore;
  /** Origins allowed by CORS outside production */
  corsOrigins?: string[];
}

export function createApp({ loader, imageStore, corsOrigins }: AppDeps) {
  const app = express();

  // Viewers run on a separate dev server locally
  if (process.env.NODE_ENV !== 'production') {
    app.use(cors({
      origin: corsOrigins ?? ['http://localhost:5173', 'http://localhost:3000'],
      credentials: true,
    }));
  }

  app.use((req, _res, next) => {
    console.log(`[API] ${req.method} ${req.path}`);
    next();
  });

  app.use('/api', sampleRoutes({ loader, imageStore }));

  return app;
}
