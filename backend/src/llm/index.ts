export { createOpenAILLM, type LLMOptions } from "./providers/openai.js";
export {
  ChatModelCompletionProvider,
  CompletionError,
  type ChatModelFactory,
  type CompletionFailureKind,
  type CompletionProvider,
  type CompletionRequest,
} from "./completion.js";
