// src/utils/llm.ts

// End-of-turn and role tokens that local chat templates sometimes leak
const SPECIAL_TOKENS = [
  /<\|im_end\|>/gi,
  /<\|im_start\|>/gi,
  /<\|end\|>/gi,
  /<\|eot_id\|>/gi,
  /<\|assistant\|>/gi,
  /<\|user\|>/gi,
];

/**
 * Strip reasoning blocks and chat-template artifacts from a model reply so
 * that keyword checks and the user only ever see the answer itself.
 */
export function cleanModelOutput(text: string): string {
  let result = text
    .replace(/<think>[\s\S]*?<\/think>/gi, '')
    .replace(/<\/?think>/gi, '');

  for (const token of SPECIAL_TOKENS) {
    result = result.replace(token, '');
  }

  return result.replace(/\n{3,}/g, '\n\n').trim();
}
