import { TextGenerator, type GenerateOptions } from '../../src/core/generation/textGenerator';

/**
 * In-process text generator returning canned responses in order.
 * An Error in the queue is thrown instead of returned.
 */
export class FakeTextGenerator extends TextGenerator {
  readonly prompts: Array<{ prompt: string; options?: GenerateOptions }> = [];
  private readonly responses: Array<string | Error>;

  constructor(...responses: Array<string | Error>) {
    super();
    this.responses = responses;
  }

  async generate(prompt: string, options?: GenerateOptions): Promise<string> {
    this.prompts.push({ prompt, options });
    const next = this.responses.shift();
    if (next === undefined) {
      throw new Error('No canned response left');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  getModelName(): string {
    return 'fake-model';
  }
}
