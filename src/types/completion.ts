export type MessageRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export type CompletionFailure =
  | { kind: 'api'; status: number; message?: string }
  | { kind: 'network'; cause: string }
  | { kind: 'exhausted' };

export type CompletionResult =
  | { ok: true; text: string }
  | { ok: false; error: CompletionFailure };

/**
 * Anything that can turn a conversation into text. The translation and reply
 * services only depend on this.
 */
export interface CompletionProvider {
  complete(messages: ChatMessage[], maxTokens: number): Promise<CompletionResult>;
}
