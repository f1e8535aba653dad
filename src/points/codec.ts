/**
 * Wire format for points.
 *
 * Client-facing structs use lowerCamelCase; the REST API uses snake_case.
 * Every field is mapped explicitly in both directions. Payload keys are
 * caller data and pass through untouched.
 */

import { z } from 'zod';
import { DecodeError } from '../errors.js';
import type { JsonValue, Payload, Point, PointId, ScoredPoint } from '../types.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

export const payloadSchema = z.record(jsonValueSchema);

/**
 * Numeric ids must survive JSON.parse exactly, so anything past
 * Number.MAX_SAFE_INTEGER is rejected rather than silently rounded.
 */
export const pointIdSchema: z.ZodType<PointId> = z.union([
  z
    .number()
    .refine((value) => Number.isSafeInteger(value) && value >= 0, {
      message: 'Numeric point id must be a non-negative safe integer',
    }),
  z.string(),
]);

export const wirePointSchema = z.object({
  id: pointIdSchema,
  vector: z.array(z.number()),
  payload: payloadSchema.nullish(),
});

export const wireScoredPointSchema = z.object({
  id: pointIdSchema,
  version: z.number().optional(),
  score: z.number(),
  payload: payloadSchema.nullish(),
  vector: z.array(z.number()).nullish(),
});

export type WirePoint = z.input<typeof wirePointSchema>;
export type WireScoredPoint = z.input<typeof wireScoredPointSchema>;

/**
 * Encodes a point into its REST representation.
 */
export function encodePoint(point: Point): WirePoint {
  const wire: WirePoint = {
    id: point.id,
    vector: point.vector,
  };

  if (point.payload !== undefined) {
    wire.payload = point.payload;
  }

  return wire;
}

/**
 * Decodes a point from its REST representation.
 * @throws {DecodeError} If a required field is missing or mistyped.
 */
export function decodePoint(raw: unknown): Point {
  const parsed = wirePointSchema.safeParse(raw);
  if (!parsed.success) {
    throw toDecodeError('point', parsed.error);
  }
  return fromWirePoint(parsed.data);
}

/**
 * Decodes a search hit from its REST representation.
 * @throws {DecodeError} If a required field is missing or mistyped.
 */
export function decodeScoredPoint(raw: unknown): ScoredPoint {
  const parsed = wireScoredPointSchema.safeParse(raw);
  if (!parsed.success) {
    throw toDecodeError('scored point', parsed.error);
  }
  return fromWireScoredPoint(parsed.data);
}

export function fromWirePoint(wire: z.output<typeof wirePointSchema>): Point {
  return withPayload({ id: wire.id, vector: wire.vector }, wire.payload);
}

export function fromWireScoredPoint(wire: z.output<typeof wireScoredPointSchema>): ScoredPoint {
  const scored: {
    id: PointId;
    score: number;
    vector?: number[];
    payload?: Payload;
    version?: number;
  } = {
    id: wire.id,
    score: wire.score,
  };

  if (wire.vector != null) {
    scored.vector = wire.vector;
  }
  if (wire.payload != null) {
    scored.payload = wire.payload;
  }
  if (wire.version !== undefined) {
    scored.version = wire.version;
  }

  return scored;
}

function withPayload(point: Point, payload: Payload | null | undefined): Point {
  return payload == null ? point : { ...point, payload };
}

function toDecodeError(what: string, error: z.ZodError): DecodeError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return new DecodeError(`Invalid ${what} at '${field}': ${issue?.message ?? 'invalid value'}`, {
    field,
  });
}
