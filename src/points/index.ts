/**
 * Point operations and the JSON codec for points.
 */

export { PointOperations, STATUS_OK } from './operations.js';
export type { UpsertPointsBody, GetPointsBody, DeletePointsBody } from './operations.js';

export {
  jsonValueSchema,
  payloadSchema,
  pointIdSchema,
  wirePointSchema,
  wireScoredPointSchema,
  encodePoint,
  decodePoint,
  decodeScoredPoint,
  fromWirePoint,
  fromWireScoredPoint,
} from './codec.js';
export type { WirePoint, WireScoredPoint } from './codec.js';
