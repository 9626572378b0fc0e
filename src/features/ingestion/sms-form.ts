export const SMS_ROUTE = { httpMethod: 'POST', path: '/post-sms' } as const;

export type SmsMessage = {
  /** Free-text incident description. */
  description: string;
  /** Originating contact, usually a phone number. */
  contact: string;
};

/**
 * Collapses a parsed form value to one string: the first entry of a repeated
 * field, or `""` for anything that is not text.
 */
export const firstFormValue = (value: unknown): string => {
  const first: unknown = Array.isArray(value) ? value[0] : value;
  return typeof first === 'string' ? first : '';
};

/**
 * Reads `Body` and `From` from a URL-encoded webhook body. Missing fields
 * become empty strings; repeated fields keep their first value.
 */
export const parseSmsForm = (rawBody: string | null | undefined): SmsMessage => {
  const params = new URLSearchParams(rawBody ?? '');

  return {
    description: params.get('Body') ?? '',
    contact: params.get('From') ?? '',
  };
};
