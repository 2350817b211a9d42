/**
 * Ensurable — "check whether the target state holds, and meet it if not".
 *
 * A Check is a zero-argument function deciding whether work is needed; when
 * it is, it hands back the work as a Meet instead of doing it. fromCheck turns
 * any Check into an Ensurable, and ensure() drives either one.
 *
 * Per ensure() call the check runs exactly once, and the meet at most once
 * (only after the check answered "unmet"). Nothing is retried and nothing is
 * kept between calls.
 */

import type { Result } from "./result.js";
import { ok, unwrap } from "./result.js";
import type { CheckOutcome, Convergence } from "./outcome.js";
import { nothingToDo, nowMet, unmet } from "./outcome.js";

/** Performs the convergence. */
export type Meet<M, E> = () => Result<M, E>;

/** Fallible check: fails with CE, or answers met(N) / unmet(Meet failing with AE). */
export type Check<N, M, CE, AE> = () => Result<CheckOutcome<N, Meet<M, AE>>, CE>;

/** Non-fallible check, as accepted by `infallible`. */
export type InfallibleCheck<N, M> = () => CheckOutcome<N, () => M>;

export interface Ensurable<N, M, E> {
  ensure(): Result<Convergence<N, M>, E>;
}

/** Anything `ensure` accepts: an Ensurable, or a bare check closure. */
export type EnsureTarget<N, M, CE, AE> = Ensurable<N, M, CE | AE> | Check<N, M, CE, AE>;

export function isEnsurable(value: unknown): value is Ensurable<unknown, unknown, unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "ensure" in value &&
    typeof value.ensure === "function"
  );
}

/** Adapter making a check closure satisfy Ensurable. */
export class CheckEnsurable<N, M, CE, AE> implements Ensurable<N, M, CE | AE> {
  constructor(private readonly check: Check<N, M, CE, AE>) {}

  ensure(): Result<Convergence<N, M>, CE | AE> {
    const checked = this.check();
    if (!checked.ok) return checked;

    const outcome = checked.value;
    if (outcome.kind === "met") return ok(nothingToDo(outcome.value));

    const meetResult = outcome.meet();
    if (!meetResult.ok) return meetResult;
    return ok(nowMet(meetResult.value));
  }
}

export function fromCheck<N, M, CE, AE>(check: Check<N, M, CE, AE>): Ensurable<N, M, CE | AE> {
  return new CheckEnsurable(check);
}

/**
 * Lift a check that cannot fail (and whose action cannot fail) into a Check.
 * Exceptions thrown by either closure still propagate.
 */
export function infallible<N, M>(check: InfallibleCheck<N, M>): Check<N, M, never, never> {
  return () => {
    const outcome = check();
    if (outcome.kind === "met") return ok(outcome);
    const action = outcome.meet;
    return ok(unmet(() => ok(action())));
  };
}

/** Run the target's single ensure operation and hand back its result unchanged. */
export function ensure<N, M, CE, AE>(
  target: EnsureTarget<N, M, CE, AE>,
): Result<Convergence<N, M>, CE | AE> {
  if (typeof target === "function") return fromCheck(target).ensure();
  return target.ensure();
}

/** ensure(), aborting with UnwrapError if the check or the action failed. */
export function ensureOrThrow<N, M, CE, AE>(target: EnsureTarget<N, M, CE, AE>): Convergence<N, M> {
  return unwrap(ensure(target));
}
