/**
 * keyflight
 *
 * Duplicate call suppression for Node.js: concurrent requests for the same
 * key share one in-flight computation.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createSingleflightGroup, ok, err, type AsyncResult } from 'keyflight';
 *
 * async function loadProfile(id: string, signal: AbortSignal): AsyncResult<Profile, 'NOT_FOUND'> {
 *   const row = await db.profiles.find(id, { signal });
 *   return row ? ok(row) : err('NOT_FOUND');
 * }
 *
 * const profiles = createSingleflightGroup<string, Profile, 'NOT_FOUND'>();
 * const result = await profiles.do(id, (signal) => loadProfile(id, signal));
 * ```
 *
 * ## Entry Points
 *
 * - `keyflight` - everything below
 * - `keyflight/core` - Result types only
 * - `keyflight/singleflight` - createSingleflightGroup, singleflight(), channels and events
 */

export { ok, err, isOk, isErr } from "./core";
export type { Ok, Err, Result, AsyncResult, MaybeAsyncResult } from "./core";

export * from "./singleflight-entry";
