import OpenAI from 'openai';
import { ICompletionOracle } from '../../domain/services/ICompletionOracle';
import { ILogger } from '../../domain/common/ILogger';
import { ConfigError } from '../../domain/common/Errors';
import { OracleConfig } from '../config/Config';

/**
 * Completion oracle backed by an OpenAI-compatible chat-completions endpoint.
 * Timeouts and retries are left to the SDK.
 */
export class OpenAICompletionOracle implements ICompletionOracle {
  private readonly client: OpenAI;

  constructor(private readonly config: OracleConfig, private readonly logger: ILogger) {
    if (!config.apiKey) {
      throw new ConfigError('ORACLE_API_KEY is required for the completion oracle');
    }

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: config.maxRetries
    });
  }

  async complete(prompt: string): Promise<string> {
    const started = Date.now();
    const response = await this.client.chat.completions.create({
      model: this.config.model,
      temperature: this.config.temperature,
      messages: [{ role: 'user', content: prompt }]
    });

    const content = response.choices[0]?.message.content ?? '';
    this.logger.debug('Oracle completion', {
      model: this.config.model,
      durationMs: Date.now() - started,
      promptTokens: response.usage?.prompt_tokens ?? 0,
      completionTokens: response.usage?.completion_tokens ?? 0
    });

    if (!content) {
      this.logger.warn('Oracle returned an empty completion', { model: this.config.model });
    }
    return content.trim();
  }
}
