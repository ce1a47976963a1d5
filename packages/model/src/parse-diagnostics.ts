/**
 * Diagnostics channel for object entries that were dropped instead of
 * failing the whole scene response.
 */

/** Why an object entry was not kept */
export type DropReason =
  | 'invalid_entry'
  | 'unknown_type'
  | 'invalid_confidence'
  | 'invalid_state'
  | 'bbox_wrong_length'
  | 'bbox_not_numeric'
  | 'bbox_out_of_range'
  | 'bbox_inverted'
  | 'bbox_too_small'
  | 'bbox_too_large'
  | 'bbox_collapsed';

/** One dropped object entry */
export interface DroppedObject {
  /** Position of the entry in the model's `objects` array */
  index: number;
  reason: DropReason;

  /** Human-readable explanation */
  detail: string;

  /** The entry exactly as received */
  entry: unknown;
}

/** Summary of object-list parsing */
export interface ObjectParseDiagnostics {
  /** Number of entries in the raw `objects` array */
  received: number;

  /** Number of entries kept */
  accepted: number;
  dropped: DroppedObject[];
}
