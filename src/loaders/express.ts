import express, { Application, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import toobusy from 'toobusy-js';
import swaggerUi from 'swagger-ui-express';
import env from '../config/env.js';
import swaggerSpec from '../config/swagger.js';
import { requestLogger, errorHandler, notFoundHandler } from '../middlewares/index.js';
import { createApiRouter, ApiDependencies } from '../routes/index.js';
import logger from '../config/logger.js';

export const createExpressApp = (dependencies: ApiDependencies): Application => {
  const app = express();

  app.set('trust proxy', 1);

  // Swagger UI documentation - MUST be before Helmet to avoid CSP issues
  app.use(
    '/api-docs',
    swaggerUi.serve,
    swaggerUi.setup(swaggerSpec, {
      explorer: true,
      customCss: '.swagger-ui .topbar { display: none }',
      customSiteTitle: 'Rate Negotiation API Documentation',
      swaggerOptions: {
        persistAuthorization: true,
        displayRequestDuration: true,
        filter: true,
        showExtensions: true,
        showCommonExtensions: true,
      },
    })
  );

  // Helmet security headers (applied after Swagger to avoid CSP conflicts)
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          scriptSrc: ["'self'", "'unsafe-inline'"],
          imgSrc: ["'self'", 'data:', 'https:'],
        },
      },
    })
  );
  app.use(cors(env.cors));

  app.use(
    rateLimit({
      windowMs: env.rateLimit.windowMs,
      max: env.rateLimit.max,
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  app.use((_req: Request, res: Response, next: NextFunction) => {
    if (toobusy()) {
      res.status(503).json({ message: 'Server is busy, please try again' });
    } else {
      next();
    }
  });

  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: true }));

  app.use(requestLogger);

  // Root health check for load balancers
  app.get('/', (_req: Request, res: Response) => {
    res.json({ status: 'ok', message: 'Rate negotiation API is running' });
  });

  // Swagger JSON endpoint
  app.get('/api-docs.json', (_req: Request, res: Response) => {
    res.setHeader('Content-Type', 'application/json');
    res.send(swaggerSpec);
  });

  logger.debug(`Swagger UI available at http://localhost:${env.port}/api-docs`);

  app.use('/api', createApiRouter(dependencies));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};

export default createExpressApp;
