/**
 * Async counterpart of ensurable.ts, for checks and actions backed by I/O.
 *
 * Same contract: the check is awaited exactly once, and the meet is started
 * only after the check has settled as "unmet", at most once.
 */

import type { Result } from "./result.js";
import { ok } from "./result.js";
import type { CheckOutcome, Convergence } from "./outcome.js";
import { nothingToDo, nowMet } from "./outcome.js";
import type { Ensurable } from "./ensurable.js";

export type AsyncMeet<M, E> = () => Promise<Result<M, E>>;

export type AsyncCheck<N, M, CE, AE> = () => Promise<
  Result<CheckOutcome<N, AsyncMeet<M, AE>>, CE>
>;

export interface AsyncEnsurable<N, M, E> {
  ensure(): Promise<Result<Convergence<N, M>, E>>;
}

export type AsyncEnsureTarget<N, M, CE, AE> =
  | AsyncEnsurable<N, M, CE | AE>
  | Ensurable<N, M, CE | AE>
  | AsyncCheck<N, M, CE, AE>;

export class AsyncCheckEnsurable<N, M, CE, AE> implements AsyncEnsurable<N, M, CE | AE> {
  constructor(private readonly check: AsyncCheck<N, M, CE, AE>) {}

  async ensure(): Promise<Result<Convergence<N, M>, CE | AE>> {
    const checked = await this.check();
    if (!checked.ok) return checked;

    const outcome = checked.value;
    if (outcome.kind === "met") return ok(nothingToDo(outcome.value));

    const meetResult = await outcome.meet();
    if (!meetResult.ok) return meetResult;
    return ok(nowMet(meetResult.value));
  }
}

export function fromAsyncCheck<N, M, CE, AE>(
  check: AsyncCheck<N, M, CE, AE>,
): AsyncEnsurable<N, M, CE | AE> {
  return new AsyncCheckEnsurable(check);
}

/** Drive an async ensurable, a sync one, or a bare async check. */
export async function ensureAsync<N, M, CE, AE>(
  target: AsyncEnsureTarget<N, M, CE, AE>,
): Promise<Result<Convergence<N, M>, CE | AE>> {
  if (typeof target === "function") return fromAsyncCheck(target).ensure();
  return await target.ensure();
}
