import type { DetectedObject, SceneContext } from '@roadscene/model';

import {
  ActionType,
  ObjectType,
  TimeOfDay,
  WeatherCondition,
} from '@roadscene/model';
import { describe, expect, test } from 'vitest';

import { IncompleteOutputError } from '../errors';
import { createBoundingBox } from '../records';
import { assembleOutput } from './output-assembler';

const sceneContext: SceneContext = {
  weather: WeatherCondition.CLEAR,
  timeOfDay: TimeOfDay.DAY,
  roadType: 'highway',
};

function object(type: ObjectType): DetectedObject {
  return {
    type,
    bbox: createBoundingBox(100, 100, 500, 500),
    confidence: 0.5,
  };
}

describe('assembleOutput', () => {
  test('assembles all parts', () => {
    const output = assembleOutput({
      prediction: { action: ActionType.STOP, confidence: 0.9 },
      objects: [object(ObjectType.CAR)],
      sceneContext,
      direction: { angle: 90, type: ActionType.TURN_RIGHT, confidence: 0.4 },
      imageId: 'frame_0001',
      processingTime: 1.25,
    });

    expect(output).toEqual({
      prediction: { action: ActionType.STOP, confidence: 0.9 },
      objects: [object(ObjectType.CAR)],
      sceneContext,
      direction: { angle: 90, type: ActionType.TURN_RIGHT, confidence: 0.4 },
      imageId: 'frame_0001',
      processingTime: 1.25,
    });
  });

  test('defaults to an empty object list and omits absent parts', () => {
    const output = assembleOutput({ sceneContext });

    expect(output).toStrictEqual({ objects: [], sceneContext });
  });

  test('keeps object order', () => {
    const output = assembleOutput({
      sceneContext,
      objects: [
        object(ObjectType.PEDESTRIAN),
        object(ObjectType.BUS),
        object(ObjectType.TRAFFIC_SIGN),
      ],
    });

    expect(output.objects.map((item) => item.type)).toEqual([
      ObjectType.PEDESTRIAN,
      ObjectType.BUS,
      ObjectType.TRAFFIC_SIGN,
    ]);
  });

  test('keeps a processing time of zero', () => {
    expect(assembleOutput({ sceneContext, processingTime: 0 })).toHaveProperty(
      'processingTime',
      0,
    );
  });

  test('freezes the result and its object list', () => {
    const objects = [object(ObjectType.CAR)];
    const output = assembleOutput({ sceneContext, objects });

    expect(Object.isFrozen(output)).toBe(true);
    expect(Object.isFrozen(output.objects)).toBe(true);
    expect(output.objects).not.toBe(objects);
    expect(Object.isFrozen(objects)).toBe(false);
  });

  test('fails without a scene context', () => {
    expect(() =>
      assembleOutput({
        prediction: { action: ActionType.CONTINUE, confidence: 0.6 },
      }),
    ).toThrow(new IncompleteOutputError('sceneContext'));
  });

  test('reports the missing field', () => {
    try {
      assembleOutput({});
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(IncompleteOutputError);
      expect(error).toMatchObject({
        kind: 'incomplete_output',
        missingField: 'sceneContext',
      });
    }
  });
});
