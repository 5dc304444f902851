export type { DocumentReader } from './reader.interface';
export type { LLMProvider, GenerateOptions, GenerateResult } from './llm-provider.interface';
