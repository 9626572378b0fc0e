import type { APIGatewayProxyResult } from 'aws-lambda';

import type { Result } from '../common/result';
import type { Incident } from '../features/incidents/incident.model';
import { toIngestionOutcome } from '../features/ingestion/ingestion.outcome';
import type { IngestionFailure } from '../features/ingestion/ingestion.types';
import {
  parseSmsForm,
  SMS_ROUTE,
  SmsMessage,
} from '../features/ingestion/sms-form';

export type RequestKind = 'sms' | 'api';

/**
 * The fields of an API Gateway proxy event the router reads.
 */
export type DispatchEvent = {
  httpMethod: string;
  path: string;
  body: string | null;
  isBase64Encoded: boolean;
  requestContext?: { requestId?: string };
};

/**
 * Pure classification: only `POST /post-sms` is an SMS ingestion request.
 */
export const classifyRequest = (
  event: Pick<DispatchEvent, 'httpMethod' | 'path'>,
): RequestKind =>
  event.httpMethod === SMS_ROUTE.httpMethod && event.path === SMS_ROUTE.path
    ? 'sms'
    : 'api';

/**
 * Removes a leading `/<basePath>` segment (an API Gateway base path mapping)
 * so the forwarded path matches the application's routes.
 */
export const stripBasePath = <E extends DispatchEvent>(
  event: E,
  basePath: string,
): E => {
  const prefix = `/${basePath.replace(/^\/+|\/+$/g, '')}`;
  if (prefix === '/') return event;

  if (event.path === prefix) return { ...event, path: '/' };
  if (event.path.startsWith(`${prefix}/`))
    return { ...event, path: event.path.slice(prefix.length) };

  return event;
};

export type IngestFn = (
  requestId: string | null | undefined,
  sms: SmsMessage,
) => Promise<Result<Incident, IngestionFailure>>;

export type DispatcherDeps<E, C> = {
  ingest: IngestFn;
  /** The CRUD API layer; receives the event unmodified. */
  forward: (event: E, context: C) => Promise<APIGatewayProxyResult>;
};

const decodeBody = (event: DispatchEvent): string =>
  event.body === null
    ? ''
    : event.isBase64Encoded
      ? Buffer.from(event.body, 'base64').toString('utf8')
      : event.body;

export const createDispatcher =
  <E extends DispatchEvent, C>({ ingest, forward }: DispatcherDeps<E, C>) =>
  async (event: E, context: C): Promise<APIGatewayProxyResult> => {
    if (classifyRequest(event) === 'api') return forward(event, context);

    const result = await ingest(
      event.requestContext?.requestId,
      parseSmsForm(decodeBody(event)),
    );
    const outcome = toIngestionOutcome(result);

    return {
      statusCode: outcome.statusCode,
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(outcome.body),
    };
  };
