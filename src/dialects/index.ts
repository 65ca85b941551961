export * from './document.js';
export { transformChatBody } from './openai.js';
export {
  transformMessagesBody,
  injectTool,
  MODEL_MAP_NAME,
  type MessagesTransformOptions,
  type MessagesTransformResult,
} from './anthropic.js';
