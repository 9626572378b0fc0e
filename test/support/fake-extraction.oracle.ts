import type {
  ExtractionOracle,
  OracleEnvelope,
} from '../../src/features/ingestion/extraction-oracle';

/**
 * Replies with canned generated text, or throws a canned error.
 */
export class FakeExtractionOracle implements ExtractionOracle {
  readonly prompts: string[] = [];
  private reply: string | null | Error = '{}';

  replyWith(content: string | null | Record<string, unknown>): this {
    this.reply =
      content === null || typeof content === 'string'
        ? content
        : JSON.stringify(content);
    return this;
  }

  failWith(error: Error): this {
    this.reply = error;
    return this;
  }

  async invoke(prompt: string): Promise<OracleEnvelope> {
    this.prompts.push(prompt);
    if (this.reply instanceof Error) throw this.reply;
    return { choices: [{ message: { content: this.reply } }] };
  }
}
