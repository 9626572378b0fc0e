import { INestApplication, ValidationPipe } from '@nestjs/common';

import { ApiExceptionFilter } from './common/http/api-exception.filter';

/**
 * HTTP concerns shared by the Node server, the Lambda handler and the e2e tests.
 */
export const configureApp = (app: INestApplication): INestApplication => {
  app.enableCors();
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.useGlobalFilters(new ApiExceptionFilter());
  return app;
};
