import 'reflect-metadata';
import serverlessExpress from '@codegenie/serverless-express';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import type {
  APIGatewayProxyEvent,
  APIGatewayProxyResult,
  Context,
} from 'aws-lambda';

import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import type { AppConfig } from './config/configuration';
import { createDispatcher, stripBasePath } from './dispatch/dispatch-router';
import { IngestionService } from './features/ingestion/ingestion.service';

type Dispatch = (
  event: APIGatewayProxyEvent,
  context: Context,
) => Promise<APIGatewayProxyResult>;

// One Nest application per warm container
let dispatcher: Promise<Dispatch> | undefined;

const bootstrap = async (): Promise<Dispatch> => {
  const app = configureApp(await NestFactory.create(AppModule));
  await app.init();

  const config = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const apiName = config.get('apiName', { infer: true });
  const logger = new Logger(apiName);

  const ingestion = app.get(IngestionService);
  const proxy = serverlessExpress({
    app: app.getHttpAdapter().getInstance(),
  });

  const dispatch = createDispatcher<APIGatewayProxyEvent, Context>({
    ingest: (requestId, sms) => ingestion.ingest(requestId, sms),
    // API Gateway mounts the API under /<API_NAME>
    forward: async (event, context) => {
      const result: APIGatewayProxyResult = await proxy(
        stripBasePath(event, apiName),
        context,
        () => undefined,
      );
      return result;
    },
  });

  return (event, context) => {
    logger.debug(
      `${event.httpMethod} ${event.path} (${event.requestContext?.requestId})`,
    );
    return dispatch(event, context);
  };
};

export const handler = async (
  event: APIGatewayProxyEvent,
  context: Context,
): Promise<APIGatewayProxyResult> => {
  dispatcher ??= bootstrap().catch((error: unknown) => {
    dispatcher = undefined;
    throw error;
  });
  const dispatch = await dispatcher;
  return dispatch(event, context);
};
