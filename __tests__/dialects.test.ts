import { describe, it, expect } from 'vitest';
import { parseDocument, encodeBody } from '../src/dialects/document.js';
import { transformChatBody } from '../src/dialects/openai.js';
import { injectTool, transformMessagesBody, MODEL_MAP_NAME } from '../src/dialects/anthropic.js';
import { ModelNotMappedError } from '../src/errors.js';

const MODEL_MAP = {
  'claude-opus-4-1-20250805': 'anthropic/claude-opus-4.1',
  'claude-sonnet-4-20250514': 'anthropic/claude-sonnet-4',
};
const WEB_SEARCH = { type: 'web_search_20250305', name: 'web_search', max_uses: 5 };

describe('parseDocument', () => {
  it('parses a JSON object', () => {
    expect(parseDocument(Buffer.from('{"model":"gpt-4o","n":2}'))).toEqual({ model: 'gpt-4o', n: 2 });
  });

  it('treats invalid JSON, non-objects and empty bodies as an empty document', () => {
    expect(parseDocument('{not json')).toEqual({});
    expect(parseDocument('[1,2]')).toEqual({});
    expect(parseDocument('"text"')).toEqual({});
    expect(parseDocument('null')).toEqual({});
    expect(parseDocument('')).toEqual({});
  });

  it('encodes documents as JSON and passes opaque bytes through', () => {
    expect(encodeBody({ kind: 'document', document: { a: 1 } }).toString()).toBe('{"a":1}');
    const bytes = Buffer.from([0xff, 0x00, 0x7b]);
    expect(encodeBody({ kind: 'opaque', bytes })).toBe(bytes);
  });
});

describe('transformChatBody', () => {
  it('injects include_usage into streamed requests', () => {
    const { body, injectedUsage } = transformChatBody({ model: 'gpt-4o', stream: true });
    expect(injectedUsage).toBe(true);
    expect(body).toEqual({ model: 'gpt-4o', stream: true, stream_options: { include_usage: true } });
  });

  it('leaves caller stream_options alone', () => {
    const input = { model: 'gpt-4o', stream: true, stream_options: { include_usage: false } };
    const { body, injectedUsage } = transformChatBody(input);
    expect(injectedUsage).toBe(false);
    expect(body).toEqual(input);
  });

  it('does nothing for non-streamed or truthy-but-not-true stream values', () => {
    expect(transformChatBody({ model: 'gpt-4o', stream: false }).body).toEqual({ model: 'gpt-4o', stream: false });
    expect(transformChatBody({ model: 'gpt-4o', stream: 'true' }).injectedUsage).toBe(false);
    expect(transformChatBody({}).body).toEqual({});
  });

  it('does not mutate the input document', () => {
    const input = { model: 'gpt-4o', stream: true };
    transformChatBody(input);
    expect(input).toEqual({ model: 'gpt-4o', stream: true });
  });
});

describe('transformMessagesBody', () => {
  it('remaps the model and leaves every other field untouched', () => {
    const input = {
      model: 'claude-sonnet-4-20250514',
      max_tokens: 1024,
      messages: [{ role: 'user', content: 'hi' }],
      metadata: { user_id: 'u1' },
    };
    const result = transformMessagesBody(input, { modelMap: MODEL_MAP });
    expect(result.body).toEqual({ ...input, model: 'anthropic/claude-sonnet-4' });
    expect(result.originalModel).toBe('claude-sonnet-4-20250514');
    expect(result.upstreamModel).toBe('anthropic/claude-sonnet-4');
    expect(result.injectedTool).toBe(false);
  });

  it('maps the opus scenario and appends the web search tool', () => {
    const result = transformMessagesBody(
      { model: 'claude-opus-4-1-20250805', stream: false },
      { modelMap: MODEL_MAP, enableWebSearch: true, webSearchTool: WEB_SEARCH }
    );
    expect(result.body).toEqual({
      model: 'anthropic/claude-opus-4.1',
      stream: false,
      tools: [WEB_SEARCH],
    });
    expect(result.injectedTool).toBe(true);
  });

  it('does not inject the tool when web search is disabled', () => {
    const result = transformMessagesBody(
      { model: 'claude-opus-4-1-20250805' },
      { modelMap: MODEL_MAP, enableWebSearch: false, webSearchTool: WEB_SEARCH }
    );
    expect(result.body).toEqual({ model: 'anthropic/claude-opus-4.1' });
  });

  it('rejects unknown models with the table name in the message', () => {
    expect(() => transformMessagesBody({ model: 'unknown-model' }, { modelMap: MODEL_MAP })).toThrow(
      new ModelNotMappedError('unknown-model', MODEL_MAP_NAME)
    );
    try {
      transformMessagesBody({ model: 'unknown-model' }, { modelMap: MODEL_MAP });
    } catch (err) {
      expect(err).toBeInstanceOf(ModelNotMappedError);
      expect((err as ModelNotMappedError).message).toBe("Model 'unknown-model' not found in ANTHROPIC_MODEL_MAP");
      expect((err as ModelNotMappedError).model).toBe('unknown-model');
    }
  });

  it('rejects a missing model with an empty identifier', () => {
    expect(() => transformMessagesBody({ messages: [] }, { modelMap: MODEL_MAP })).toThrow(
      "Model '' not found in ANTHROPIC_MODEL_MAP"
    );
  });

  it('does not treat inherited object keys as mapped models', () => {
    expect(() => transformMessagesBody({ model: 'toString' }, { modelMap: MODEL_MAP })).toThrow(
      "Model 'toString' not found in ANTHROPIC_MODEL_MAP"
    );
  });

  it('renders a non-string model as JSON in the rejection', () => {
    expect(() => transformMessagesBody({ model: 42 }, { modelMap: MODEL_MAP })).toThrow(
      "Model '42' not found in ANTHROPIC_MODEL_MAP"
    );
  });

  it('uses a custom table name when given', () => {
    expect(() =>
      transformMessagesBody({ model: 'x' }, { modelMap: MODEL_MAP, modelMapName: 'MY_MAP' })
    ).toThrow("Model 'x' not found in MY_MAP");
  });

  it('remapping is not idempotent: the second pass rejects the upstream id', () => {
    const once = transformMessagesBody({ model: 'claude-opus-4-1-20250805' }, { modelMap: MODEL_MAP });
    expect(() => transformMessagesBody(once.body, { modelMap: MODEL_MAP })).toThrow(ModelNotMappedError);
  });
});

describe('injectTool', () => {
  it('appends after existing tools of other types', () => {
    const existing = { name: 'get_weather', input_schema: { type: 'object' } };
    const { body, injected } = injectTool({ tools: [existing] }, WEB_SEARCH);
    expect(injected).toBe(true);
    expect(body['tools']).toEqual([existing, WEB_SEARCH]);
  });

  it('is idempotent when the tool type is already present', () => {
    const first = injectTool({ model: 'm' }, WEB_SEARCH);
    const second = injectTool(first.body, WEB_SEARCH);
    expect(second.injected).toBe(false);
    const tools = second.body['tools'];
    expect(Array.isArray(tools) ? tools.filter((t) => JSON.stringify(t).includes('web_search_20250305')) : []).toHaveLength(1);
    expect(second.body).toEqual({ model: 'm', tools: [WEB_SEARCH] });
  });

  it('keeps a caller-supplied entry of the same type as is', () => {
    const callers = { type: 'web_search_20250305', name: 'web_search', max_uses: 1 };
    const { body, injected } = injectTool({ tools: [callers] }, WEB_SEARCH);
    expect(injected).toBe(false);
    expect(body['tools']).toEqual([callers]);
  });

  it('treats a non-array tools value as empty', () => {
    const { body } = injectTool({ tools: 'nope' }, WEB_SEARCH);
    expect(body['tools']).toEqual([WEB_SEARCH]);
  });
});
