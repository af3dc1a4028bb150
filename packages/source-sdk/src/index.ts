export type { RawRecord, SourceManifest, CollectOptions, CollectResult, Source } from './types.js';
export { defineSource } from './factory.js';
export { rawRecordSchema, collectedRecordSchema, coerceRawRecord } from './schema.js';
export { fetchJson, isRecord, asString, asNumber, errorMessage } from './http.js';
export type { FetchJsonOptions } from './http.js';
export { collectFromQueries } from './collect.js';
export type { CollectQueriesOptions } from './collect.js';
