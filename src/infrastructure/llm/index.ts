/**
 * LLM infrastructure exports.
 */

export { AIProvider, type AIProviderOptions } from "./ai-sdk-provider.js";
