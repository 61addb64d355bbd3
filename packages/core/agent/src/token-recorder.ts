import type { TokenUsage } from '@campaign-agent/shared';
import type { ModelUsage } from './types.js';

/**
 * Accumulates model token usage for one query.
 * Every model call, including a failed-parse retry, is added here.
 */
export class TokenRecorder {
  private input = 0;
  private output = 0;
  private calls = 0;

  add(usage: ModelUsage): void {
    this.input += Math.max(0, usage.inputTokens);
    this.output += Math.max(0, usage.outputTokens);
    this.calls++;
  }

  get callCount(): number {
    return this.calls;
  }

  snapshot(): TokenUsage {
    return {
      input: this.input,
      output: this.output,
      total: this.input + this.output,
    };
  }
}
