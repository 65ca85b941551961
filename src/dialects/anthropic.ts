/**
 * Anthropic-style Messages body rewrite: model remapping and web-search
 * tool injection.
 * @packageDocumentation
 */

import { ModelNotMappedError } from '../errors.js';
import type { JsonObject, JsonValue } from './document.js';
import { isJsonObject } from './document.js';

export const MODEL_MAP_NAME = 'ANTHROPIC_MODEL_MAP';

export interface MessagesTransformOptions {
  modelMap: Readonly<Record<string, string>>;
  /** Name shown in the rejection message. */
  modelMapName?: string;
  /** Tool definition appended when web search is enabled. Must carry a string `type`. */
  webSearchTool?: JsonObject | null;
  enableWebSearch?: boolean;
}

export interface MessagesTransformResult {
  body: JsonObject;
  originalModel: string;
  upstreamModel: string;
  injectedTool: boolean;
}

/**
 * Append `tool` to the body's `tools` unless an entry of the same `type`
 * is already there. A missing or non-array `tools` counts as empty.
 */
export function injectTool(body: JsonObject, tool: JsonObject): { body: JsonObject; injected: boolean } {
  const existing: JsonValue[] = Array.isArray(body['tools']) ? body['tools'] : [];
  const toolType = tool['type'];
  const present = existing.some((entry) => isJsonObject(entry) && entry['type'] === toolType);
  if (present) {
    return { body: { ...body }, injected: false };
  }
  return { body: { ...body, tools: [...existing, tool] }, injected: true };
}

/**
 * Rewrite a Messages request for the upstream.
 *
 * Throws {@link ModelNotMappedError} when `model` is missing or has no
 * mapping; in that case nothing must be sent upstream. Not idempotent: the
 * remapped model is not itself a key of the table.
 */
export function transformMessagesBody(
  body: JsonObject,
  opts: MessagesTransformOptions
): MessagesTransformResult {
  const tableName = opts.modelMapName ?? MODEL_MAP_NAME;
  const rawModel = body['model'];
  const originalModel = typeof rawModel === 'string' ? rawModel : rawModel == null ? '' : JSON.stringify(rawModel);

  const upstreamModel =
    typeof rawModel === 'string' && Object.hasOwn(opts.modelMap, rawModel)
      ? opts.modelMap[rawModel]
      : undefined;
  if (upstreamModel === undefined) {
    throw new ModelNotMappedError(originalModel, tableName);
  }

  let out: JsonObject = { ...body, model: upstreamModel };
  let injectedTool = false;

  if (opts.enableWebSearch && opts.webSearchTool) {
    const result = injectTool(out, opts.webSearchTool);
    out = result.body;
    injectedTool = result.injected;
  }

  return { body: out, originalModel, upstreamModel, injectedTool };
}
