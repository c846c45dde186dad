import type pino from 'pino';
import type { TextGenerator } from '../generation/textGenerator';
import type { ExtractedRecord } from '../extraction/types/records';
import { createChildLogger, generateCorrelationId } from '../../utils/logger';
import { ENHANCEMENT_SYSTEM_PROMPT, buildEnhancementPrompt } from './prompt';
import { mergeEnhancements, parseEnhancementResponse, serializeRecords } from './tabular';

export type EnhancementState =
  | 'idle'
  | 'serializing'
  | 'awaiting_response'
  | 'parsing'
  | 'merging'
  | 'done'
  | 'failed';

const TRANSITIONS: Readonly<Record<EnhancementState, readonly EnhancementState[]>> = {
  idle: ['serializing', 'done'],
  serializing: ['awaiting_response', 'failed'],
  awaiting_response: ['parsing', 'failed'],
  parsing: ['merging', 'failed'],
  merging: ['done', 'failed'],
  done: [],
  failed: [],
};

export interface EnhancementAdapterOptions {
  correlationId?: string;
}

/**
 * Adds Company and Location to extracted records through a text generator.
 *
 * Each `enhance` call is one attempt that walks
 * idle → serializing → awaiting_response → parsing → merging → done.
 * Any failure moves to `failed` and the call resolves to null, leaving the
 * caller with its original records. Transport errors and unusable answers
 * are not distinguished.
 */
export class EnhancementAdapter {
  private state: EnhancementState = 'idle';
  private history: EnhancementState[] = ['idle'];
  private readonly log: pino.Logger;

  constructor(
    private readonly generator: TextGenerator,
    options: EnhancementAdapterOptions = {}
  ) {
    this.log = createChildLogger(options.correlationId ?? generateCorrelationId());
  }

  getState(): EnhancementState {
    return this.state;
  }

  getHistory(): readonly EnhancementState[] {
    return this.history;
  }

  async enhance(records: readonly ExtractedRecord[]): Promise<ExtractedRecord[] | null> {
    this.state = 'idle';
    this.history = ['idle'];

    if (records.length === 0) {
      this.transition('done');
      return [];
    }

    try {
      this.transition('serializing');
      const prompt = buildEnhancementPrompt(serializeRecords(records));

      this.transition('awaiting_response');
      const response = await this.generator.generate(prompt, {
        systemPrompt: ENHANCEMENT_SYSTEM_PROMPT,
      });

      this.transition('parsing');
      const rows = parseEnhancementResponse(response);
      if (!rows) {
        this.fail('unparsable_response', { responseLength: response.length });
        return null;
      }

      this.transition('merging');
      const enhanced = mergeEnhancements(records, rows);
      const matched = enhanced.filter(
        record => rows.some(row => row.Name.trim() === record.Name.trim())
      ).length;

      this.transition('done');
      this.log.info(
        {
          event: 'enhancement_done',
          recordCount: enhanced.length,
          parsedRows: rows.length,
          matched,
          model: this.generator.getModelName(),
        },
        'AI enhancement completed'
      );
      return enhanced;
    } catch (error) {
      this.fail('exception', { error: error instanceof Error ? error.message : 'Unknown error' });
      return null;
    }
  }

  private transition(next: EnhancementState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Invalid enhancement transition: ${this.state} -> ${next}`);
    }
    this.log.debug({ event: 'enhancement_transition', from: this.state, to: next });
    this.state = next;
    this.history.push(next);
  }

  private fail(reason: string, fields: Record<string, unknown>): void {
    this.log.warn(
      { event: 'enhancement_failed', reason, failedIn: this.state, ...fields },
      'AI enhancement failed, keeping original records'
    );
    this.state = 'failed';
    this.history.push('failed');
  }
}
