import type { LoggerMethods } from '@roadscene/logger';
import type {
  DetectedObject,
  DropReason,
  DroppedObject,
  TrafficLightState,
} from '@roadscene/model';

import type { SceneParseResult } from '../types';
import type { BBoxLimits } from '../validators';

import { CoordinateSpace, ObjectType } from '@roadscene/model';
import { isPlainObject } from 'es-toolkit';

import { MalformedResponseError, ModelOutputError } from '../errors';
import {
  createBoundingBox,
  createDetectedObject,
  createSceneContext,
} from '../records';
import {
  DEFAULT_BBOX_LIMITS,
  parseConfidence,
  toMillirange,
  validateNormalizedBBox,
  validateObjectType,
  validateTimeOfDay,
  validateTrafficLightState,
  validateWeatherCondition,
} from '../validators';
import { BaseResponseParser } from './base-response-parser';
import {
  describeSchemaError,
  sceneJsonSchema,
  sceneObjectEntrySchema,
} from './response-schemas';

type EntryOutcome =
  | { accepted: true; object: DetectedObject }
  | { accepted: false; reason: DropReason; detail: string };

/**
 * SceneJsonParser
 *
 * Scene analysis dialect:
 *
 * ```json
 * {"objects": [{"type": "vehicle", "bbox": [0.1, 0.1, 0.5, 0.5], "confidence": 0.9}],
 *  "context": {"weather": "clear", "time": "day", "road": "highway"}}
 * ```
 *
 * A missing or malformed `context` fails the whole response, a missing
 * `objects` key means no objects. Individual object entries that fail any
 * check are dropped and reported in the diagnostics; accepted boxes are
 * converted to millirange.
 */
export class SceneJsonParser extends BaseResponseParser {
  private readonly limits: BBoxLimits;

  constructor(
    logger?: LoggerMethods,
    limits: BBoxLimits = DEFAULT_BBOX_LIMITS,
  ) {
    super('SceneJsonParser', 'scene-json', logger);
    this.limits = limits;
  }

  /**
   * @throws ResponseParsingError
   */
  parse(content: string): SceneParseResult {
    return this.guard(content, () => {
      const parsed = sceneJsonSchema.safeParse(this.readJson(content));
      if (!parsed.success) {
        throw new MalformedResponseError(
          'a JSON object with a "context" object (weather, time, road) and an optional "objects" array',
          describeSchemaError(parsed.error),
          content,
        );
      }

      const { context } = parsed.data;
      const sceneContext = createSceneContext(
        validateWeatherCondition(context.weather),
        validateTimeOfDay(context.time),
        context.road,
      );

      const entries = parsed.data.objects ?? [];
      const objects: DetectedObject[] = [];
      const dropped: DroppedObject[] = [];

      entries.forEach((entry, index) => {
        const outcome = this.parseEntry(entry);
        if (outcome.accepted) {
          objects.push(outcome.object);
          return;
        }
        this.log(
          'warn',
          `Dropped object #${index} (${outcome.reason}): ${outcome.detail}`,
        );
        dropped.push({
          index,
          reason: outcome.reason,
          detail: outcome.detail,
          entry,
        });
      });

      if (dropped.length > 0) {
        this.log(
          'info',
          `Kept ${objects.length} of ${entries.length} objects (${dropped.length} dropped)`,
        );
      }

      return {
        objects,
        sceneContext,
        diagnostics: {
          received: entries.length,
          accepted: objects.length,
          dropped,
        },
      };
    });
  }

  /**
   * Check one object entry. Checks run in order: shape, type, confidence,
   * traffic-light state, box geometry.
   */
  private parseEntry(entry: unknown): EntryOutcome {
    const shape = sceneObjectEntrySchema.safeParse(entry);
    if (!shape.success) {
      return {
        accepted: false,
        reason: 'invalid_entry',
        detail: describeSchemaError(shape.error),
      };
    }
    const raw = shape.data;

    let type: ObjectType;
    let confidence: number;
    let state: TrafficLightState | undefined;
    try {
      type = validateObjectType(raw.type);
    } catch (error) {
      return this.reject('unknown_type', error);
    }
    try {
      confidence = parseConfidence(raw.confidence);
    } catch (error) {
      return this.reject('invalid_confidence', error);
    }
    // state is only meaningful on traffic lights; elsewhere it is ignored
    if (
      type === ObjectType.TRAFFIC_LIGHT &&
      raw.state !== undefined &&
      raw.state !== null
    ) {
      if (typeof raw.state !== 'string') {
        return {
          accepted: false,
          reason: 'invalid_state',
          detail: `expected a string state, got ${JSON.stringify(raw.state)}`,
        };
      }
      try {
        state = validateTrafficLightState(raw.state);
      } catch (error) {
        return this.reject('invalid_state', error);
      }
    }

    const bbox = validateNormalizedBBox(raw.bbox, this.limits);
    if (!bbox.valid) {
      return { accepted: false, reason: bbox.reason, detail: bbox.detail };
    }

    const [xMin, yMin, xMax, yMax] = toMillirange(bbox.bbox);
    const object = createDetectedObject({
      type,
      bbox: createBoundingBox(
        xMin,
        yMin,
        xMax,
        yMax,
        CoordinateSpace.MILLIRANGE,
      ),
      confidence,
      state,
      metadata: isPlainObject(raw.metadata) ? raw.metadata : undefined,
    });
    return { accepted: true, object };
  }

  private reject(reason: DropReason, error: unknown): EntryOutcome {
    if (error instanceof ModelOutputError) {
      return { accepted: false, reason, detail: error.message };
    }
    throw error;
  }
}
