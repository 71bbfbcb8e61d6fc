import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ChatAnthropic } from '@langchain/anthropic';
import { env } from '@/infrastructure/config/environment';
import { ConfigurationError } from '@/types/error.types';

export interface ModelConfig {
  modelName: string;
  temperature?: number;
  maxTokens?: number;
  /** Falls back to ANTHROPIC_API_KEY */
  apiKey?: string;
}

export class ModelFactory {
  /**
   * Creates a configured Anthropic chat model.
   * @throws ConfigurationError when no API key is available
   */
  static create(config: ModelConfig): BaseChatModel {
    const { modelName, temperature = 0, maxTokens = 1024 } = config;
    const apiKey = config.apiKey ?? env.ANTHROPIC_API_KEY;

    if (!apiKey) {
      throw new ConfigurationError('ANTHROPIC_API_KEY environment variable is required to create a chat model.');
    }

    return new ChatAnthropic({
      model: modelName,
      temperature,
      maxTokens,
      apiKey,
    });
  }

  /**
   * Model named by ANTHROPIC_MODEL at MODEL_TEMPERATURE.
   */
  static createDefault(): BaseChatModel {
    return this.create({
      modelName: env.ANTHROPIC_MODEL,
      temperature: env.MODEL_TEMPERATURE,
    });
  }
}
