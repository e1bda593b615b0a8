import swaggerUi from 'swagger-ui-express';
import { Express } from 'express';
import { swaggerDocs } from '../documentation';
import env from './env';
import { logger } from '../utils/logger';

export const setupSwagger = (app: Express) => {
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerDocs));
  logger.info(`Swagger docs available at http://localhost:${env.PORT}/api-docs`);
};
