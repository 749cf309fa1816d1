/**
 * keyflight/core
 *
 * Result primitives without the group machinery.
 *
 * @example
 * ```typescript
 * import { ok, err, type AsyncResult } from 'keyflight/core';
 *
 * const fetchUser = async (id: string): AsyncResult<User, 'NOT_FOUND'> =>
 *   id === '1' ? ok({ id, name: 'Alice' }) : err('NOT_FOUND');
 * ```
 */

export {
  // Types
  type Ok,
  type Err,
  type Result,
  type AsyncResult,
  type MaybeAsyncResult,

  // Constructors and guards
  ok,
  err,
  isOk,
  isErr,
} from "./core";
