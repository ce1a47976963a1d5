import type { VisionCallConfig, VisionCallResult } from '@roadscene/shared';
import type { LanguageModel } from 'ai';

import {
  ActionType,
  CoordinateSpace,
  ObjectType,
  TimeOfDay,
  WeatherCondition,
} from '@roadscene/model';
import { VisionCaller } from '@roadscene/shared';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import {
  ModelInvocationError,
  ResponseParsingError,
  SceneAnalysisError,
} from '../errors';
import { DEFAULT_DRIVING_PROMPTS } from '../prompts';
import {
  DrivingSceneAnalyzer,
  defaultImageId,
} from './driving-scene-analyzer';

vi.mock('@roadscene/shared', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@roadscene/shared')>();
  return {
    ...actual,
    VisionCaller: {
      call: vi.fn(),
    },
  };
});

const mockCall = vi.mocked(VisionCaller.call);

const mockLogger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

const model: LanguageModel = 'vision-primary';

const LINE_RESPONSE = [
  'Action: SLOW_DOWN, Confidence: 0.75',
  'Weather: rainy',
  'Time: night',
  'Road: city street',
].join('\n');

const JSON_RESPONSE =
  '{"Action":"STOP","Confidence":0.9,"Weather":"clear","Time":"day","Road":"highway"}';

const SCENE_RESPONSE = JSON.stringify({
  objects: [
    { type: 'vehicle', bbox: [0.1, 0.1, 0.5, 0.5], confidence: 0.9 },
    { type: 'pedestrian', bbox: [0.6, 0.2, 0.75, 0.8], confidence: 0.8 },
  ],
  context: { weather: 'clear', time: 'day', road: 'highway' },
});

function reply(text: string, usedFallback = false): VisionCallResult {
  return {
    text,
    usedFallback,
    usage: {
      component: 'DrivingSceneAnalyzer',
      phase: 'test',
      model: usedFallback ? 'fallback' : 'primary',
      modelName: usedFallback ? 'vision-fallback' : 'vision-primary',
      inputTokens: 10,
      outputTokens: 5,
      totalTokens: 15,
    },
  };
}

/** Answer each call according to its phase; 1.5 s pass during the call */
function answerByPhase(responses: Record<string, string>): void {
  mockCall.mockImplementation(async (config: VisionCallConfig) => {
    vi.setSystemTime(1_500);
    const text = responses[config.phase];
    if (text === undefined) {
      throw new Error(`unexpected phase ${config.phase}`);
    }
    return reply(text);
  });
}

describe('defaultImageId', () => {
  test('uses the file name without extension', () => {
    expect(defaultImageId('frames/0001.png')).toBe('0001');
    expect(defaultImageId('/data/drive.cam.front.jpg')).toBe('drive.cam.front');
  });
});

describe('DrivingSceneAnalyzer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('predict', () => {
    test('parses a line response into an output', async () => {
      answerByPhase({ prediction: LINE_RESPONSE });
      const analyzer = new DrivingSceneAnalyzer(mockLogger, model);

      const output = await analyzer.predict('/data/frames/frame_0001.png');

      expect(output).toEqual({
        prediction: { action: ActionType.SLOW_DOWN, confidence: 0.75 },
        objects: [],
        sceneContext: {
          weather: WeatherCondition.RAINY,
          timeOfDay: TimeOfDay.NIGHT,
          roadType: 'city street',
        },
        imageId: 'frame_0001',
        processingTime: 1.5,
      });
      expect(Object.isFrozen(output)).toBe(true);
    });

    test('sends the line prompt with prediction settings', async () => {
      answerByPhase({ prediction: LINE_RESPONSE });
      const analyzer = new DrivingSceneAnalyzer(mockLogger, model);

      await analyzer.predict('/data/frames/frame_0001.png');

      expect(mockCall).toHaveBeenCalledTimes(1);
      expect(mockCall).toHaveBeenCalledWith(
        expect.objectContaining({
          imagePath: '/data/frames/frame_0001.png',
          prompt: DEFAULT_DRIVING_PROMPTS.line,
          primaryModel: model,
          maxRetries: 3,
          temperature: 0,
          component: 'DrivingSceneAnalyzer',
          phase: 'prediction',
        }),
      );
      expect(mockLogger.debug).toHaveBeenCalledWith(
        '[DrivingSceneAnalyzer] Raw prediction response:',
        LINE_RESPONSE,
      );
    });

    test('uses the json grammar and a caller image id', async () => {
      answerByPhase({ prediction: JSON_RESPONSE });
      const analyzer = new DrivingSceneAnalyzer(mockLogger, model);

      const output = await analyzer.predict('/data/a.png', {
        grammar: 'json',
        imageId: 'camera-front',
      });

      expect(output.prediction).toEqual({
        action: ActionType.STOP,
        confidence: 0.9,
      });
      expect(output.imageId).toBe('camera-front');
      expect(mockCall).toHaveBeenCalledWith(
        expect.objectContaining({ prompt: DEFAULT_DRIVING_PROMPTS.json }),
      );
    });

    test('runs three sub-queries for the multi-call grammar', async () => {
      answerByPhase({
        'prediction-action': 'Action: TURN_LEFT\nConfidence: 0.7',
        'prediction-context': 'Weather: snowy\nTime: dawn\nRoad: mountain pass',
        'prediction-direction': 'Angle: -45\nAction: TURN_LEFT\nConfidence: 0.6',
      });
      const analyzer = new DrivingSceneAnalyzer(mockLogger, model);

      const output = await analyzer.predict('/data/b.png', {
        grammar: 'multi-call',
      });

      expect(mockCall).toHaveBeenCalledTimes(3);
      expect(output.direction).toEqual({
        angle: 315,
        type: ActionType.TURN_LEFT,
        confidence: 0.6,
      });
      expect(output.sceneContext.roadType).toBe('mountain pass');
      expect(mockCall).toHaveBeenCalledWith(
        expect.objectContaining({
          prompt: DEFAULT_DRIVING_PROMPTS.multiCall.direction,
          phase: 'prediction-direction',
        }),
      );
    });

    test('wraps collaborator failures in ModelInvocationError', async () => {
      const failure = new Error('connection refused');
      mockCall.mockRejectedValue(failure);
      const analyzer = new DrivingSceneAnalyzer(mockLogger, model);

      const error = await analyzer
        .predict('/data/c.png')
        .catch((error: unknown) => error);

      expect(error).toBeInstanceOf(ModelInvocationError);
      expect(error).toMatchObject({
        message: 'Model call failed during prediction: connection refused',
        component: 'DrivingSceneAnalyzer',
        phase: 'prediction',
        cause: failure,
      });
      expect(mockLogger.error).toHaveBeenCalledWith(
        '[DrivingSceneAnalyzer] Model call failed during prediction:',
        'connection refused',
      );
    });

    test('lets parsing failures through as ResponseParsingError', async () => {
      answerByPhase({ prediction: 'I cannot tell.' });
      const analyzer = new DrivingSceneAnalyzer(mockLogger, model);

      const error = await analyzer
        .predict('/data/c.png')
        .catch((error: unknown) => error);

      expect(error).toBeInstanceOf(ResponseParsingError);
      expect(error).toMatchObject({
        grammar: 'line',
        rawContent: 'I cannot tell.',
      });
    });

    test('warns when the fallback model answered', async () => {
      mockCall.mockResolvedValue(reply(LINE_RESPONSE, true));
      const analyzer = new DrivingSceneAnalyzer(mockLogger, model, {
        fallbackModel: 'vision-fallback',
      });

      await analyzer.predict('/data/d.png');

      expect(mockCall).toHaveBeenCalledWith(
        expect.objectContaining({ fallbackModel: 'vision-fallback' }),
      );
      expect(mockLogger.warn).toHaveBeenCalledWith(
        '[DrivingSceneAnalyzer] Primary model failed during prediction, answered by vision-fallback',
      );
    });
  });

  describe('analyzeScene', () => {
    test('keeps millirange boxes without an image size', async () => {
      answerByPhase({ 'scene-analysis': SCENE_RESPONSE });
      const analyzer = new DrivingSceneAnalyzer(mockLogger, model);

      const result = await analyzer.analyzeScene('/data/e.png');

      expect(result.objects[0].bbox).toEqual({
        xMin: 100,
        yMin: 100,
        xMax: 500,
        yMax: 500,
        space: CoordinateSpace.MILLIRANGE,
      });
      expect(result.diagnostics).toEqual({
        received: 2,
        accepted: 2,
        dropped: [],
      });
      expect(mockCall).toHaveBeenCalledWith(
        expect.objectContaining({
          prompt: DEFAULT_DRIVING_PROMPTS.scene,
          phase: 'scene-analysis',
          temperature: 0.5,
          topP: 0.5,
          seed: 42,
          maxOutputTokens: 1024,
        }),
      );
    });

    test('rescales boxes to the image size', async () => {
      answerByPhase({ 'scene-analysis': SCENE_RESPONSE });
      const analyzer = new DrivingSceneAnalyzer(mockLogger, model);

      const result = await analyzer.analyzeScene('/data/e.png', {
        imageSize: { width: 640, height: 480 },
      });

      expect(result.objects.map((object) => object.bbox)).toEqual([
        {
          xMin: 64,
          yMin: 48,
          xMax: 320,
          yMax: 240,
          space: CoordinateSpace.PIXEL,
        },
        {
          xMin: 384,
          yMin: 96,
          xMax: 480,
          yMax: 384,
          space: CoordinateSpace.PIXEL,
        },
      ]);
    });

    test('reports parser and normalizer drops by raw position', async () => {
      answerByPhase({
        'scene-analysis': JSON.stringify({
          objects: [
            { type: 'car', bbox: [0.1, 0.1, 0.105, 0.5], confidence: 0.5 },
            { type: 'car', bbox: [0.1, 0.1, 0.125, 0.5], confidence: 0.5 },
            { type: 'bus', bbox: [0.2, 0.2, 0.6, 0.6], confidence: 0.5 },
          ],
          context: { weather: 'clear', time: 'day', road: 'highway' },
        }),
      });
      const analyzer = new DrivingSceneAnalyzer(mockLogger, model);

      const result = await analyzer.analyzeScene('/data/f.png', {
        imageSize: { width: 10, height: 10 },
      });

      expect(result.objects).toHaveLength(1);
      expect(result.objects[0].type).toBe(ObjectType.BUS);
      expect(result.diagnostics.received).toBe(3);
      expect(result.diagnostics.accepted).toBe(1);
      expect(
        result.diagnostics.dropped.map(({ index, reason }) => [index, reason]),
      ).toEqual([
        [0, 'bbox_too_small'],
        [1, 'bbox_collapsed'],
      ]);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        '[DrivingSceneAnalyzer] 2 of 3 objects dropped for /data/f.png',
      );
    });

    test('applies sampling and size overrides', async () => {
      answerByPhase({
        'scene-analysis': JSON.stringify({
          objects: [{ type: 'bus', bbox: [0, 0, 1, 1], confidence: 0.9 }],
          context: { weather: 'clear', time: 'day', road: 'highway' },
        }),
      });
      const analyzer = new DrivingSceneAnalyzer(mockLogger, model, {
        sceneSampling: { seed: 7 },
        bboxLimits: { maxSize: 1 },
        prompts: { scene: 'custom scene prompt' },
      });

      const result = await analyzer.analyzeScene('/data/g.png');

      expect(result.objects).toHaveLength(1);
      expect(mockCall).toHaveBeenCalledWith(
        expect.objectContaining({
          prompt: 'custom scene prompt',
          seed: 7,
          temperature: 0.5,
        }),
      );
    });
  });

  describe('analyze', () => {
    test('combines scene objects with the prediction', async () => {
      answerByPhase({
        'scene-analysis': SCENE_RESPONSE,
        prediction: LINE_RESPONSE,
      });
      const analyzer = new DrivingSceneAnalyzer(mockLogger, model, {
        maxRetries: 1,
        temperature: 0.2,
      });

      const output = await analyzer.analyze('/data/frames/frame_0042.jpg');

      expect(output.prediction).toEqual({
        action: ActionType.SLOW_DOWN,
        confidence: 0.75,
      });
      expect(output.objects.map((object) => object.type)).toEqual([
        ObjectType.VEHICLE,
        ObjectType.PEDESTRIAN,
      ]);
      expect(output.sceneContext).toEqual({
        weather: WeatherCondition.CLEAR,
        timeOfDay: TimeOfDay.DAY,
        roadType: 'highway',
      });
      expect(output.direction).toBeUndefined();
      expect(output.imageId).toBe('frame_0042');
      expect(output.processingTime).toBe(1.5);
      expect(mockCall).toHaveBeenCalledWith(
        expect.objectContaining({
          phase: 'prediction',
          maxRetries: 1,
          temperature: 0.2,
        }),
      );
      expect(mockLogger.info).toHaveBeenCalledWith(
        '[DrivingSceneAnalyzer] Analyzed frame_0042: 2 objects in 1.5s',
      );
    });
  });

  describe('analyzeImages', () => {
    test('keeps input order and captures per-image failures', async () => {
      mockCall.mockImplementation(async (config: VisionCallConfig) => {
        if (config.imagePath === '/data/broken.png') {
          throw new Error('image unreadable');
        }
        return reply(
          config.phase === 'scene-analysis' ? SCENE_RESPONSE : LINE_RESPONSE,
        );
      });
      const analyzer = new DrivingSceneAnalyzer(mockLogger, model);
      const onImageComplete = vi.fn();

      const results = await analyzer.analyzeImages(
        [
          { imagePath: '/data/first.png' },
          { imagePath: '/data/broken.png' },
          { imagePath: '/data/third.png', imageId: 'custom-third' },
        ],
        { concurrency: 2, onImageComplete },
      );

      expect(results.map((result) => result.imageId)).toEqual([
        'first',
        'broken',
        'custom-third',
      ]);
      expect('output' in results[0]).toBe(true);
      expect('output' in results[2]).toBe(true);
      const failed = results[1];
      expect('error' in failed && failed.error).toBeInstanceOf(
        ModelInvocationError,
      );
      expect(onImageComplete).toHaveBeenCalledTimes(3);
      expect(mockLogger.info).toHaveBeenCalledWith(
        '[DrivingSceneAnalyzer] Batch complete: 2 succeeded, 1 failed',
      );
    });

    test('passes per-image options through', async () => {
      answerByPhase({
        'scene-analysis': SCENE_RESPONSE,
        'prediction-action': 'Action: STOP Confidence: 1',
        'prediction-context': 'Weather: clear Time: day Road: highway',
        'prediction-direction': 'Angle: 0 Action: STOP Confidence: 1',
      });
      const analyzer = new DrivingSceneAnalyzer(mockLogger, model);

      const [result] = await analyzer.analyzeImages([
        {
          imagePath: '/data/h.png',
          grammar: 'multi-call',
          imageSize: { width: 1000, height: 1000 },
        },
      ]);

      expect('output' in result && result.output.direction).toEqual({
        angle: 0,
        type: ActionType.STOP,
        confidence: 1,
      });
      expect('output' in result && result.output.objects[0].bbox.space).toBe(
        CoordinateSpace.PIXEL,
      );
    });

    test('stops when the abort signal fired', async () => {
      const controller = new AbortController();
      controller.abort();
      const analyzer = new DrivingSceneAnalyzer(mockLogger, model, {
        abortSignal: controller.signal,
      });

      const error = await analyzer
        .analyzeImages([{ imagePath: '/data/i.png' }])
        .catch((error: unknown) => error);

      expect(error).toBeInstanceOf(ModelInvocationError);
      expect(error).toMatchObject({
        phase: 'batch',
        message: 'Model call failed during batch: This operation was aborted',
      });
      expect(mockCall).not.toHaveBeenCalled();
    });

    test.each([0, -1, 1.5])(
      'rejects concurrency %s as a SceneAnalysisError',
      async (concurrency) => {
        const analyzer = new DrivingSceneAnalyzer(mockLogger, model);

        const error = await analyzer
          .analyzeImages([{ imagePath: '/data/i.png' }], { concurrency })
          .catch((error: unknown) => error);

        expect(error).toBeInstanceOf(SceneAnalysisError);
        expect(error).toMatchObject({
          message: `Concurrency must be a positive integer, got ${concurrency}`,
        });
        expect(mockCall).not.toHaveBeenCalled();
      },
    );
  });
});
