/**
 * @fileoverview Guided packaging strategy
 *
 * Wraps one block of content between a fixed preamble that frames the reply
 * as a title and a closing instruction carrying the user's directive.
 */

import type { GuidedInput } from './types.js';

export const GUIDED_PREAMBLE =
  'Analyze the content below. Your output must be concise, because it will be used as a title.';

export const GUIDED_CONTENT_OPEN = '<content>';
export const GUIDED_CONTENT_CLOSE = '</content>';

export const GUIDED_CLOSING_PREFIX = 'Task:';
export const GUIDED_CLOSING_SUFFIX =
  'Use the result of the task above as the title. Output only that title.';

/**
 * Build the guided-strategy content string.
 * @returns The packaged content, or "" when either part is blank
 */
export function buildGuidedContent(input: GuidedInput): string {
  const coreContent = input.coreContent.trim();
  const directive = input.directive.trim();

  if (!coreContent || !directive) {
    return '';
  }

  return [
    GUIDED_PREAMBLE,
    '',
    GUIDED_CONTENT_OPEN,
    coreContent,
    GUIDED_CONTENT_CLOSE,
    '',
    `${GUIDED_CLOSING_PREFIX} ${directive}`,
    GUIDED_CLOSING_SUFFIX,
  ].join('\n');
}
