import type { LoggerMethods } from '@roadscene/logger';
import type { AnalysisOutput, DroppedObject } from '@roadscene/model';
import type { LanguageModel } from 'ai';

import type { DrivingPromptOverrides, DrivingPrompts } from '../prompts';
import type {
  ImageSize,
  PredictionGrammar,
  PredictionResponse,
  PredictionResult,
  SceneParseResult,
} from '../types';
import type { BBoxLimits } from '../validators';

import { ConcurrentPool, VisionCaller } from '@roadscene/shared';
import { range } from 'es-toolkit';
import * as path from 'node:path';

import { assembleOutput } from '../assembler';
import { SCENE_ANALYZER, SCENE_SAMPLING } from '../config/constants';
import { ModelInvocationError, SceneAnalysisError } from '../errors';
import { CoordinateNormalizer } from '../geometry';
import { PredictionResponseParser, SceneJsonParser } from '../parsers';
import { resolvePrompts } from '../prompts';
import { DEFAULT_BBOX_LIMITS } from '../validators';

/**
 * Sampling settings for the scene (object detection) call
 */
export interface SceneSamplingOptions {
  temperature: number;
  topP: number;
  seed: number;
  maxOutputTokens: number;
}

/**
 * Options for DrivingSceneAnalyzer
 */
export interface DrivingSceneAnalyzerOptions {
  /**
   * Retry count handed to the AI SDK per model (default: 3)
   */
  maxRetries?: number;

  /**
   * Temperature for prediction calls (default: 0)
   */
  temperature?: number;

  /**
   * Model tried once when the primary model fails
   */
  fallbackModel?: LanguageModel;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Prompt overrides; missing prompts use the built-in ones
   */
  prompts?: DrivingPromptOverrides;

  /**
   * Sampling for the scene call (default: temperature 0.5, topP 0.5,
   * seed 42, 1024 output tokens)
   */
  sceneSampling?: Partial<SceneSamplingOptions>;

  /**
   * Accepted normalized box sizes (default: 0.01 to 0.9)
   */
  bboxLimits?: Partial<BBoxLimits>;
}

export interface PredictOptions {
  /** Response grammar to request (default: 'line') */
  grammar?: PredictionGrammar;

  /** Identifier of the image (default: file name without extension) */
  imageId?: string;
}

export interface AnalyzeSceneOptions {
  /** Rescale boxes to this pixel size; omitted keeps millirange */
  imageSize?: ImageSize;
}

export interface AnalyzeOptions extends PredictOptions, AnalyzeSceneOptions {}

/**
 * One image of a batch
 */
export interface ImageInput extends AnalyzeOptions {
  imagePath: string;
}

export interface AnalyzeImagesOptions {
  /** Images analyzed in parallel (default: 1) */
  concurrency?: number;

  /** Called after each image settles */
  onImageComplete?: (result: ImageAnalysisResult, index: number) => void;
}

/**
 * Per-image outcome of a batch. Failures are captured instead of aborting
 * the batch.
 */
export type ImageAnalysisResult =
  | { imageId: string; output: AnalysisOutput }
  | { imageId: string; error: SceneAnalysisError };

interface ModelCallSettings {
  temperature: number;
  topP?: number;
  seed?: number;
  maxOutputTokens?: number;
}

/**
 * Derive an image identifier from its path ("frames/0001.png" -> "0001")
 */
export function defaultImageId(imagePath: string): string {
  return path.parse(imagePath).name;
}

/**
 * DrivingSceneAnalyzer
 *
 * Sends driving-scene images to a vision-language model with the built-in
 * prompts and turns the answers into validated AnalysisOutput records.
 *
 * - predict(): action prediction and scene context in the chosen grammar
 * - analyzeScene(): detected objects and scene context (scene JSON dialect)
 * - analyze(): both of the above combined into one output
 * - analyzeImages(): analyze() over many images with bounded concurrency
 *
 * Model failures surface as ModelInvocationError, unreadable answers as
 * ResponseParsingError. Retries are left to the AI SDK (`maxRetries`) and
 * the optional fallback model.
 */
export class DrivingSceneAnalyzer {
  private readonly componentName = 'DrivingSceneAnalyzer';
  private readonly logger: LoggerMethods;
  private readonly model: LanguageModel;
  private readonly fallbackModel?: LanguageModel;
  private readonly maxRetries: number;
  private readonly temperature: number;
  private readonly abortSignal?: AbortSignal;
  private readonly prompts: DrivingPrompts;
  private readonly sceneSampling: SceneSamplingOptions;
  private readonly predictionParser: PredictionResponseParser;
  private readonly sceneParser: SceneJsonParser;
  private readonly normalizer: CoordinateNormalizer;

  /**
   * @param logger - Logger instance for logging
   * @param model - Vision-language model for all calls
   * @param options - Optional configuration
   */
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options?: DrivingSceneAnalyzerOptions,
  ) {
    this.logger = logger;
    this.model = model;
    this.fallbackModel = options?.fallbackModel;
    this.maxRetries = options?.maxRetries ?? SCENE_ANALYZER.DEFAULT_MAX_RETRIES;
    this.temperature =
      options?.temperature ?? SCENE_ANALYZER.DEFAULT_TEMPERATURE;
    this.abortSignal = options?.abortSignal;
    this.prompts = resolvePrompts(options?.prompts);
    this.sceneSampling = {
      temperature:
        options?.sceneSampling?.temperature ?? SCENE_SAMPLING.TEMPERATURE,
      topP: options?.sceneSampling?.topP ?? SCENE_SAMPLING.TOP_P,
      seed: options?.sceneSampling?.seed ?? SCENE_SAMPLING.SEED,
      maxOutputTokens:
        options?.sceneSampling?.maxOutputTokens ??
        SCENE_SAMPLING.MAX_OUTPUT_TOKENS,
    };

    this.predictionParser = new PredictionResponseParser(logger);
    this.sceneParser = new SceneJsonParser(logger, {
      ...DEFAULT_BBOX_LIMITS,
      ...options?.bboxLimits,
    });
    this.normalizer = new CoordinateNormalizer(logger);
  }

  /**
   * Predict the driving action and scene context for one image
   *
   * @throws ModelInvocationError
   * @throws ResponseParsingError
   */
  async predict(
    imagePath: string,
    options: PredictOptions = {},
  ): Promise<AnalysisOutput> {
    const startedAt = Date.now();
    const grammar = options.grammar ?? 'line';
    this.log('info', `Predicting ${imagePath} (${grammar})`);

    const result = await this.requestPrediction(imagePath, grammar);

    return assembleOutput({
      ...result,
      imageId: options.imageId ?? defaultImageId(imagePath),
      processingTime: this.elapsedSeconds(startedAt),
    });
  }

  /**
   * Detect objects and read the scene context of one image.
   *
   * Boxes stay in millirange unless `imageSize` is given. Boxes that
   * collapse on the pixel grid are reported as dropped.
   *
   * @throws ModelInvocationError
   * @throws ResponseParsingError
   * @throws CoordinateSpaceError
   */
  async analyzeScene(
    imagePath: string,
    options: AnalyzeSceneOptions = {},
  ): Promise<SceneParseResult> {
    const text = await this.callModel(
      imagePath,
      this.prompts.scene,
      'scene-analysis',
      this.sceneSampling,
    );
    const parsed = this.sceneParser.parse(text);
    const rescaled = this.normalizer.rescale(parsed.objects, options.imageSize);

    const dropped = this.mergeDropped(parsed, rescaled.dropped);
    if (dropped.length > 0) {
      this.log(
        'warn',
        `${dropped.length} of ${parsed.diagnostics.received} objects dropped for ${imagePath}`,
      );
    }

    return {
      objects: rescaled.objects,
      sceneContext: parsed.sceneContext,
      diagnostics: {
        received: parsed.diagnostics.received,
        accepted: rescaled.objects.length,
        dropped,
      },
    };
  }

  /**
   * Full analysis: scene objects, scene context and action prediction.
   * The scene context of the output comes from the scene call.
   *
   * @throws ModelInvocationError
   * @throws ResponseParsingError
   * @throws CoordinateSpaceError
   */
  async analyze(
    imagePath: string,
    options: AnalyzeOptions = {},
  ): Promise<AnalysisOutput> {
    const startedAt = Date.now();
    const grammar = options.grammar ?? 'line';
    this.log('info', `Analyzing ${imagePath} (${grammar})`);

    const [scene, prediction] = await Promise.all([
      this.analyzeScene(imagePath, { imageSize: options.imageSize }),
      this.requestPrediction(imagePath, grammar),
    ]);

    const output = assembleOutput({
      prediction: prediction.prediction,
      objects: scene.objects,
      sceneContext: scene.sceneContext,
      direction: prediction.direction,
      imageId: options.imageId ?? defaultImageId(imagePath),
      processingTime: this.elapsedSeconds(startedAt),
    });

    this.log(
      'info',
      `Analyzed ${output.imageId}: ${output.objects.length} objects in ${output.processingTime}s`,
    );
    return output;
  }

  /**
   * Analyze several images. Results keep the input order; a failing image
   * yields an `error` entry instead of failing the batch.
   *
   * @throws SceneAnalysisError when `concurrency` is not a positive integer
   * @throws ModelInvocationError when the abort signal fires
   */
  async analyzeImages(
    inputs: readonly ImageInput[],
    options: AnalyzeImagesOptions = {},
  ): Promise<ImageAnalysisResult[]> {
    const concurrency =
      options.concurrency ?? SCENE_ANALYZER.DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new SceneAnalysisError(
        `Concurrency must be a positive integer, got ${concurrency}`,
      );
    }
    this.log(
      'info',
      `Analyzing ${inputs.length} images (concurrency: ${concurrency})`,
    );

    const results = await this.runBatch(inputs, concurrency, options);

    const failed = results.filter((result) => 'error' in result).length;
    this.log(
      'info',
      `Batch complete: ${results.length - failed} succeeded, ${failed} failed`,
    );
    return results;
  }

  private async runBatch(
    inputs: readonly ImageInput[],
    concurrency: number,
    options: AnalyzeImagesOptions,
  ): Promise<ImageAnalysisResult[]> {
    try {
      return await ConcurrentPool.run(
        inputs,
        concurrency,
        async (input): Promise<ImageAnalysisResult> => {
          const imageId = input.imageId ?? defaultImageId(input.imagePath);
          try {
            const output = await this.analyze(input.imagePath, {
              grammar: input.grammar,
              imageSize: input.imageSize,
              imageId,
            });
            return { imageId, output };
          } catch (error) {
            if (!(error instanceof SceneAnalysisError)) {
              throw error;
            }
            this.log('error', `Failed to analyze ${imageId}:`, error.message);
            return { imageId, error };
          }
        },
        options.onImageComplete,
        this.abortSignal,
      );
    } catch (error) {
      if (error instanceof SceneAnalysisError) {
        throw error;
      }
      this.log(
        'error',
        'Batch stopped:',
        SceneAnalysisError.getErrorMessage(error),
      );
      throw ModelInvocationError.wrap(this.componentName, 'batch', error);
    }
  }

  /**
   * Request a prediction in the given grammar and parse it
   */
  private async requestPrediction(
    imagePath: string,
    grammar: PredictionGrammar,
  ): Promise<PredictionResult> {
    const response = await this.fetchPredictionResponse(imagePath, grammar);
    return this.predictionParser.parse(response);
  }

  private async fetchPredictionResponse(
    imagePath: string,
    grammar: PredictionGrammar,
  ): Promise<PredictionResponse> {
    const settings: ModelCallSettings = { temperature: this.temperature };

    switch (grammar) {
      case 'line':
      case 'json':
        return {
          grammar,
          content: await this.callModel(
            imagePath,
            this.prompts[grammar],
            'prediction',
            settings,
          ),
        };
      case 'multi-call': {
        const { multiCall } = this.prompts;
        const [action, context, direction] = await Promise.all([
          this.callModel(
            imagePath,
            multiCall.action,
            'prediction-action',
            settings,
          ),
          this.callModel(
            imagePath,
            multiCall.context,
            'prediction-context',
            settings,
          ),
          this.callModel(
            imagePath,
            multiCall.direction,
            'prediction-direction',
            settings,
          ),
        ]);
        return { grammar, responses: { action, context, direction } };
      }
    }
  }

  /**
   * Call the model and return its raw text. Every failure of the call is
   * wrapped in ModelInvocationError.
   */
  private async callModel(
    imagePath: string,
    prompt: string,
    phase: string,
    settings: ModelCallSettings,
  ): Promise<string> {
    try {
      const result = await VisionCaller.call({
        imagePath,
        prompt,
        primaryModel: this.model,
        fallbackModel: this.fallbackModel,
        maxRetries: this.maxRetries,
        temperature: settings.temperature,
        topP: settings.topP,
        seed: settings.seed,
        maxOutputTokens: settings.maxOutputTokens,
        abortSignal: this.abortSignal,
        component: this.componentName,
        phase,
      });

      if (result.usedFallback) {
        this.log(
          'warn',
          `Primary model failed during ${phase}, answered by ${result.usage.modelName}`,
        );
      }
      this.log('debug', `Raw ${phase} response:`, result.text);
      return result.text;
    } catch (error) {
      this.log(
        'error',
        `Model call failed during ${phase}:`,
        SceneAnalysisError.getErrorMessage(error),
      );
      throw ModelInvocationError.wrap(this.componentName, phase, error);
    }
  }

  /**
   * Combine parser drops with normalizer drops. Normalizer indices point
   * into the accepted list and are mapped back to raw entry positions.
   */
  private mergeDropped(
    parsed: SceneParseResult,
    collapsed: DroppedObject[],
  ): DroppedObject[] {
    if (collapsed.length === 0) {
      return parsed.diagnostics.dropped;
    }

    const parserDropped = new Set(
      parsed.diagnostics.dropped.map((item) => item.index),
    );
    const rawIndices = range(parsed.diagnostics.received).filter(
      (index) => !parserDropped.has(index),
    );

    return [
      ...parsed.diagnostics.dropped,
      ...collapsed.map((item) => ({ ...item, index: rawIndices[item.index] })),
    ].sort((a, b) => a.index - b.index);
  }

  private elapsedSeconds(startedAt: number): number {
    return Math.max(0, (Date.now() - startedAt) / 1000);
  }

  private log(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
    ...args: unknown[]
  ): void {
    this.logger[level](`[${this.componentName}] ${message}`, ...args);
  }
}
