/**
 * Argument checks run before any request is built.
 */

import { ValidationError } from './errors.js';
import { isValidNumericId, type PointId } from './types.js';

export function requireCollectionName(name: string): void {
  if (name.trim().length === 0) {
    throw new ValidationError('Collection name cannot be empty');
  }
}

export function requirePositiveInteger(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive integer, got ${value}`, {
      field,
      value,
    });
  }
}

export function requirePointId(id: PointId): void {
  if (typeof id === 'number' && !isValidNumericId(id)) {
    throw new ValidationError(`Invalid numeric point id: ${id}`, { pointId: id });
  }
  if (typeof id === 'string' && id.length === 0) {
    throw new ValidationError('Point id string cannot be empty');
  }
}

export function requireFiniteNumber(value: number, field: string): void {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a finite number, got ${value}`, { field, value });
  }
}

export function requireVector(vector: number[], field = 'vector'): void {
  if (vector.length === 0) {
    throw new ValidationError(`${field} cannot be empty`);
  }
  const index = vector.findIndex((value) => !Number.isFinite(value));
  if (index !== -1) {
    throw new ValidationError(`${field} contains a non-finite value at index ${index}`, {
      field,
      index,
    });
  }
}
