/**
 * Cleanup for raw model text before it is parsed or shown
 */

const TOOL_REQUEST_BLOCK = /\[TOOL_REQUEST\][\s\S]*?\[END_TOOL_REQUEST\]/g;
const TOOL_RESULT_BLOCK = /\[TOOL_RESULT\][\s\S]*?\[END_TOOL_RESULT\]/g;
const THINK_BLOCK = /<think>[\s\S]*?<\/think>/g;
// A reasoning block cut off by the token limit never closes
const UNCLOSED_THINK = /<think>[\s\S]*$/;

/**
 * Remove reasoning blocks and tool-call markers some local models emit,
 * and collapse the blank lines they leave behind
 */
export function cleanModelOutput(text: string): string {
  return text
    .replace(TOOL_REQUEST_BLOCK, '')
    .replace(TOOL_RESULT_BLOCK, '')
    .replace(THINK_BLOCK, '')
    .replace(UNCLOSED_THINK, '')
    .trim()
    .replace(/\n\s*\n/g, '\n');
}

/**
 * Strip markdown code fences around a JSON answer
 */
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }
  return trimmed.replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '').trim();
}
