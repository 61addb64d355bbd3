import { describe, it, expect } from 'vitest';
import { cleanModelOutput, stripCodeFences } from '../model-output.js';

describe('cleanModelOutput', () => {
  it('should remove reasoning blocks and collapse blank lines', () => {
    expect(cleanModelOutput('<think>plan the answer</think>\n\nAnswer\n\n\nMore')).toBe('Answer\nMore');
  });

  it('should remove tool markers', () => {
    expect(cleanModelOutput('Answer [TOOL_REQUEST]{"name":"search"}[END_TOOL_REQUEST]')).toBe('Answer');
    expect(cleanModelOutput('[TOOL_RESULT]rows[END_TOOL_RESULT]Done')).toBe('Done');
  });

  it('should drop a reasoning block that never closes', () => {
    expect(cleanModelOutput('Partial answer <think>still thinking')).toBe('Partial answer');
  });

  it('should leave plain text alone', () => {
    expect(cleanModelOutput('Campaign 7 leads on clicks.')).toBe('Campaign 7 leads on clicks.');
  });
});

describe('stripCodeFences', () => {
  it('should unwrap a fenced JSON answer', () => {
    expect(stripCodeFences('```json\n{"intent":"general"}\n```')).toBe('{"intent":"general"}');
    expect(stripCodeFences('```\n[1, 2]\n```')).toBe('[1, 2]');
  });

  it('should trim unfenced text', () => {
    expect(stripCodeFences('  {"intent":"general"} \n')).toBe('{"intent":"general"}');
  });
});
