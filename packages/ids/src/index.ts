// Public API for @latency-monitor/ids
import { type EntityType, getPrefix } from './prefixes.js';
import { generateUlid } from './ulid.js';

export type { EntityType } from './prefixes.js';
export type { ValidationResult } from './validate.js';
export { validateId } from './validate.js';

export function generateId(entityType: EntityType): string {
  return `${getPrefix(entityType)}_${generateUlid()}`;
}

export function generateSessionId(): string {
  return generateId('session');
}

export function generateBatchId(): string {
  return generateId('batch');
}
