/**
 * OpenAI-style Chat Completions body rewrite.
 * @packageDocumentation
 */

import type { JsonObject } from './document.js';

/**
 * Ask the upstream to report token usage on streamed completions.
 * Returns a new document; the input is not modified.
 */
export function transformChatBody(body: JsonObject): { body: JsonObject; injectedUsage: boolean } {
  if (body['stream'] === true && !('stream_options' in body)) {
    return {
      body: { ...body, stream_options: { include_usage: true } },
      injectedUsage: true,
    };
  }
  return { body: { ...body }, injectedUsage: false };
}
