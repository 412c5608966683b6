import { ChatMessage, CompletionProvider } from '../types/index.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { resultText } from '../adapters/completion-client.js';

export const SUPPORT_AGENT_PERSONA =
  'You are a helpful, empathetic customer support agent. Be clear, concise, and provide actionable steps.';

export class ResponseGenerator {
  constructor(
    private readonly provider: CompletionProvider,
    private readonly maxTokens: number = DEFAULT_CONFIG.reply.maxTokens
  ) {}

  async generateReply(englishText: string): Promise<string> {
    const messages: ChatMessage[] = [
      { role: 'system', content: SUPPORT_AGENT_PERSONA },
      {
        role: 'user',
        content: `Customer says: ${englishText}\n\nRespond professionally in 2-4 sentences with clear next steps.`
      }
    ];

    return resultText(await this.provider.complete(messages, this.maxTokens));
  }
}
