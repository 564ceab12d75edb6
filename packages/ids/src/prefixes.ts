// Prefix registry for the identifiers the monitor hands out.
// Prefixes are 3 lowercase letters, unique, and frozen.

export type EntityType = 'session' | 'batch' | 'export';

export const PREFIX_MAP: Readonly<Record<EntityType, string>> = Object.freeze({
  session: 'ses',
  batch: 'bat',
  export: 'exp',
});

const ENTITY_TYPES: readonly EntityType[] = ['session', 'batch', 'export'];

const REVERSE_PREFIX_MAP: ReadonlyMap<string, EntityType> = new Map(
  ENTITY_TYPES.map((entity) => [PREFIX_MAP[entity], entity] as const),
);

export function getPrefix(entityType: EntityType): string {
  return PREFIX_MAP[entityType];
}

export function getEntityType(prefix: string): EntityType | undefined {
  return REVERSE_PREFIX_MAP.get(prefix);
}
