/**
 * game-version
 *
 * Game release version values: normalization, ordering and
 * compatibility targeting.
 */

// Constants (wildcard token, widening patches, grammar)
export * from '#/constants';

// Errors and result types
export * from '#/errors';

// Memo caches (owned or process-wide)
export * from '#/cache';

// Normalizer (raw string -> canonical form)
export * from '#/normalizer';

// Version value, comparator, range matcher
export * from '#/version';

// Schemas (Zod validation, serialization boundary)
export * from '#/schemas';
