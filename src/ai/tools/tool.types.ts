import { ToolInput } from '../rag/rag.types';

export interface ToolOutput {
  data: unknown;
  /** Plain-text digest handed to the responder. */
  summary: string;
}

export interface ToolProvider {
  readonly id: string;
  readonly description: string;
  invoke(input: ToolInput, signal: AbortSignal): Promise<ToolOutput>;
}

export interface ToolRequest {
  toolId: string;
  input: ToolInput;
}

export const TOOL_PROVIDERS = Symbol('TOOL_PROVIDERS');
