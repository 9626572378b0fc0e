import { Err, Ok, Result, errorMessage } from '../../common/result';
import { INCIDENT_DEFAULTS } from '../incidents/incident.model';

import type { OracleEnvelope } from './extraction-oracle';
import type { ExtractedFields, ParseFailure } from './ingestion.types';

export const EXTRACTED_FIELDS = [
  'incident_location',
  'incident_type',
  'priority',
] as const satisfies ReadonlyArray<keyof ExtractedFields>;

const FIELD_DEFAULTS: ExtractedFields = {
  incident_location: INCIDENT_DEFAULTS.incident_location,
  incident_type: INCIDENT_DEFAULTS.incident_type,
  priority: INCIDENT_DEFAULTS.priority,
};

/**
 * Fixed extraction template. The description is embedded verbatim.
 */
export const buildExtractionPrompt = (description: string): string =>
  [
    'Extract the following details from the incident description:',
    '- Incident Location',
    '- Incident Type',
    '- Priority (High/Medium/Low)',
    `Description: "${description}"`,
    `Respond in JSON format with keys: ${EXTRACTED_FIELDS.join(', ')}.`,
  ].join('\n');

/**
 * Generated text from the first choice, trimmed. Throws when the envelope
 * carries no text at all.
 */
export const unwrapGeneratedText = (envelope: OracleEnvelope): string => {
  const content = envelope.choices[0]?.message.content;
  if (typeof content !== 'string')
    throw new Error('Model response contained no text content');

  return content.trim();
};

const isJsonObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const pickField = (
  source: Record<string, unknown>,
  key: keyof ExtractedFields,
): string => {
  const value = source[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean')
    return String(value);
  return FIELD_DEFAULTS[key];
};

/**
 * Parses the model text as a JSON object and fills missing fields with their
 * defaults. Values are not checked beyond that.
 */
export const parseExtraction = (
  text: string,
): Result<ExtractedFields, ParseFailure> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return Err({
      type: 'parse_failure',
      message: `Model response is not valid JSON: ${errorMessage(error)}`,
    });
  }

  if (!isJsonObject(parsed))
    return Err({
      type: 'parse_failure',
      message: 'Model response is not a JSON object',
    });

  return Ok({
    incident_location: pickField(parsed, 'incident_location'),
    incident_type: pickField(parsed, 'incident_type'),
    priority: pickField(parsed, 'priority'),
  });
};
