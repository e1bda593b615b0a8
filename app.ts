import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import appRoutes from './routes';
import { setupSwagger } from './config/swagger';
import env from './config/env';
import { errorHandler, notFoundHandler } from './middlewares/error-handler';
import { requestLogger } from './middlewares/logger-middleware';
import { requestContext } from './middlewares/request-context';

const app = express();
app.use(helmet());
app.use(cors());
app.use(requestContext);

app.use(express.json({ limit: '1mb' }));
app.use(express.urlencoded({ extended: true, limit: '1mb' }));

// Only use request logger outside production
if (env.NODE_ENV !== 'production') {
  app.use(requestLogger);
}

setupSwagger(app);

app.get('/', (req, res) => {
  res.send({ message: '🚀 Credit ledger backend is running' });
});

app.use('/v1', appRoutes);

app.use(notFoundHandler);
app.use(errorHandler);

export default app;
