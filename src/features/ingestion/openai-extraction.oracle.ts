import OpenAI from 'openai';

import type { ExtractionOracle, OracleEnvelope } from './extraction-oracle';

export const MAX_TOKENS = 1000;

export class OpenAiExtractionOracle implements ExtractionOracle {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
  ) {}

  async invoke(prompt: string): Promise<OracleEnvelope> {
    return this.client.chat.completions.create({
      model: this.model,
      max_tokens: MAX_TOKENS,
      messages: [{ role: 'user', content: prompt }],
    });
  }
}
