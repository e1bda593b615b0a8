import lendingDoc from './lending.doc.json';
import adminDoc from './admin.doc.json';

export const swaggerDocs = {
  openapi: '3.0.0',
  info: {
    title: 'Credit Ledger API',
    version: '1.0.0',
    description: 'Multi-asset lending ledger: supply, borrow, repay and liquidate with index-based interest',
  },
  servers: [{ url: 'http://localhost:5000', description: 'Local Dev Server' }],
  components: {
    securitySchemes: {
      bearerAuth: {
        type: 'http',
        scheme: 'bearer',
        bearerFormat: 'JWT',
        description: 'Enter your JWT token in the format **Bearer &lt;token&gt;**',
      },
    },
  },
  security: [{ bearerAuth: [] }],
  tags: [...lendingDoc.tags, ...adminDoc.tags],
  paths: {
    ...lendingDoc.paths,
    ...adminDoc.paths,
  },
};
