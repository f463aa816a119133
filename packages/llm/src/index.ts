export type {
  CompletionOptions,
  CompletionResult,
  ICompletionProvider,
} from "./completion-provider.interface.js";
export { OpenAICompletionProvider } from "./openai-completion.js";
export type { OpenAIChatApi, OpenAICompletionConfig } from "./openai-completion.js";
