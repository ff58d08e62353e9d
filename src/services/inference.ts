import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { logger as rootLogger, Logger } from '../lib/logger';
import { EndpointError } from '../lib/errors';
import { InferenceClient, ScoringConfig } from '../types/score';

/** Assistant prefill meaning "deliberation already concluded". */
export const NO_THINKING_PREFIX = '<think>\n\n</think>\n\n';

export function buildMessages(prompt: string, thinkingEnabled: boolean): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [{ role: 'user', content: prompt }];
  if (!thinkingEnabled) messages.push({ role: 'assistant', content: NO_THINKING_PREFIX });
  return messages;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

function messageOf(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Chat-completion client for any OpenAI-compatible server (mlx_lm.server, Ollama,
 * vLLM, OpenAI itself). One call is one round-trip: the SDK's own retries are off
 * and every failure surfaces as an EndpointError.
 */
export class OpenAIInferenceClient implements InferenceClient {
  constructor(
    private readonly config: ScoringConfig,
    private readonly log: Logger = rootLogger
  ) {}

  private getClient() {
    // Lazily create the client so Jest mocks and env are applied per test/run
    return new OpenAI({
      apiKey: this.config.endpoint.apiKey,
      baseURL: this.config.endpoint.baseUrl,
      maxRetries: 0
    });
  }

  async complete(prompt: string): Promise<string> {
    const { endpoint, thinkingEnabled, maxTokens, temperature, timeoutMs } = this.config;
    const messages = buildMessages(prompt, thinkingEnabled);
    if (process.env.NODE_ENV !== 'production') {
      this.log.debug({ model: endpoint.model, promptPreview: prompt.slice(0, 300) }, 'LLM prompt');
    }
    try {
      const resp = await this.getClient().chat.completions.create(
        {
          model: endpoint.model,
          messages,
          max_tokens: maxTokens,
          temperature
        },
        { timeout: timeoutMs }
      );
      const text = resp.choices?.[0]?.message?.content ?? '';
      if (process.env.NODE_ENV !== 'production') {
        this.log.debug({ responsePreview: text.slice(0, 500), usage: resp.usage }, 'LLM raw response');
      }
      return text;
    } catch (err: unknown) {
      const status = statusOf(err);
      this.log.error({ err: messageOf(err), status, baseUrl: endpoint.baseUrl }, 'LLM call failed');
      throw new EndpointError(`inference request failed: ${messageOf(err)}`, { status, cause: err });
    }
  }
}

export function createInferenceClient(config: ScoringConfig, log: Logger = rootLogger): InferenceClient {
  return new OpenAIInferenceClient(config, log);
}

export default createInferenceClient;
