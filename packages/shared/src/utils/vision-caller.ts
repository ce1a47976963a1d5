import { type LanguageModel, generateText } from 'ai';
import { readFileSync } from 'node:fs';
import * as path from 'node:path';

/**
 * Configuration for a single image + prompt call
 */
export interface VisionCallConfig {
  /**
   * Path of the image sent alongside the prompt
   */
  imagePath: string;

  /**
   * Prompt text sent before the image
   */
  prompt: string;

  /**
   * Primary model for the call (required)
   */
  primaryModel: LanguageModel;

  /**
   * Fallback model tried once after the primary model fails (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Retry count handed to the AI SDK for each model
   */
  maxRetries: number;

  /**
   * Sampling temperature (0-1)
   */
  temperature?: number;

  /**
   * Nucleus sampling cutoff
   */
  topP?: number;

  /**
   * Seed for providers that support deterministic sampling
   */
  seed?: number;

  /**
   * Upper bound on generated tokens
   */
  maxOutputTokens?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Component name for tracking (e.g., 'DrivingSceneAnalyzer')
   */
  component: string;

  /**
   * Phase name for tracking (e.g., 'prediction', 'scene-analysis')
   */
  phase: string;
}

/**
 * Token usage of one call, tagged with the model that served it
 */
export interface VisionCallUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * Raw result of a vision call
 */
export interface VisionCallResult {
  /** Model output exactly as returned (untrimmed) */
  text: string;
  usage: VisionCallUsage;
  usedFallback: boolean;
}

/** Image media types keyed by lower-case file extension */
const IMAGE_MEDIA_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.gif': 'image/gif',
};

const DEFAULT_MEDIA_TYPE = 'image/png';

interface GenerateResponse {
  text: string;
  usage?: {
    inputTokens?: number;
    outputTokens?: number;
    totalTokens?: number;
  };
}

/**
 * VisionCaller - sends one image and one prompt to a vision-language model
 * and returns the raw text answer.
 *
 * Parsing is deliberately left to the caller: the response grammars are
 * free text or loosely structured JSON and are validated downstream.
 *
 * Fallback strategy:
 * 1. Call the primary model (the AI SDK retries up to `maxRetries`)
 * 2. If it fails and a fallback model is configured, call the fallback once
 * 3. Aborted calls never fall back
 *
 * @example
 * ```typescript
 * const result = await VisionCaller.call({
 *   imagePath: '/data/frames/0001.png',
 *   prompt: 'Describe the driving scene...',
 *   primaryModel: openai('gpt-4o'),
 *   maxRetries: 3,
 *   component: 'DrivingSceneAnalyzer',
 *   phase: 'prediction',
 * });
 *
 * console.log(result.text);
 * ```
 */
export class VisionCaller {
  /**
   * Get a printable model identifier
   */
  static extractModelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  /**
   * Resolve the media type from the image file extension
   */
  static resolveMediaType(imagePath: string): string {
    const extension = path.extname(imagePath).toLowerCase();
    return IMAGE_MEDIA_TYPES[extension] ?? DEFAULT_MEDIA_TYPE;
  }

  private static buildUsage(
    config: VisionCallConfig,
    modelName: string,
    response: GenerateResponse,
    usedFallback: boolean,
  ): VisionCallUsage {
    return {
      component: config.component,
      phase: config.phase,
      model: usedFallback ? 'fallback' : 'primary',
      modelName,
      inputTokens: response.usage?.inputTokens ?? 0,
      outputTokens: response.usage?.outputTokens ?? 0,
      totalTokens: response.usage?.totalTokens ?? 0,
    };
  }

  private static async generate(
    model: LanguageModel,
    config: VisionCallConfig,
    image: Buffer,
  ): Promise<GenerateResponse> {
    const response = await generateText({
      model,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: config.prompt },
            {
              type: 'image',
              image,
              mediaType: this.resolveMediaType(config.imagePath),
            },
          ],
        },
      ],
      temperature: config.temperature,
      topP: config.topP,
      seed: config.seed,
      maxOutputTokens: config.maxOutputTokens,
      maxRetries: config.maxRetries,
      abortSignal: config.abortSignal,
    });

    return { text: response.text, usage: response.usage };
  }

  /**
   * Call the model with one image and one prompt.
   *
   * @param config - Call configuration
   * @returns Raw text with usage information
   * @throws The primary error when no fallback applies, otherwise the fallback error
   */
  static async call(config: VisionCallConfig): Promise<VisionCallResult> {
    const image = readFileSync(config.imagePath);
    const primaryModelName = this.extractModelName(config.primaryModel);

    try {
      const response = await this.generate(config.primaryModel, config, image);

      return {
        text: response.text,
        usage: this.buildUsage(config, primaryModelName, response, false),
        usedFallback: false,
      };
    } catch (primaryError) {
      if (config.abortSignal?.aborted || !config.fallbackModel) {
        throw primaryError;
      }

      const fallbackModelName = this.extractModelName(config.fallbackModel);
      const response = await this.generate(config.fallbackModel, config, image);

      return {
        text: response.text,
        usage: this.buildUsage(config, fallbackModelName, response, true),
        usedFallback: true,
      };
    }
  }
}
