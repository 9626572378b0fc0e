export const EXTRACTION_ORACLE = Symbol('EXTRACTION_ORACLE');

/**
 * The part of a chat-completion response the pipeline reads. Generated text
 * sits at `choices[0].message.content`.
 */
export type OracleEnvelope = {
  choices: ReadonlyArray<{
    message: { content: string | null };
  }>;
};

export interface ExtractionOracle {
  invoke(prompt: string): Promise<OracleEnvelope>;
}
