export type EnvelopeMeta = {
  request_id: string;
  generated_at: string; // ISO string
};

export type ErrorItem = {
  code: string;
  message: string;
  field?: string | null;
};

export type Envelope<T> = {
  data: T | null;
  meta: EnvelopeMeta;
  errors: ErrorItem[];
};

const meta = (requestId: string): EnvelopeMeta => ({
  request_id: requestId,
  generated_at: new Date().toISOString(),
});

export const ok = <T>(data: T, requestId: string): Envelope<T> => ({
  data,
  meta: meta(requestId),
  errors: [],
});

export const fail = (
  errors: ErrorItem[],
  requestId: string,
): Envelope<never> => ({
  data: null,
  meta: meta(requestId),
  errors,
});
