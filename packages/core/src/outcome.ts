/**
 * Outcome types for a single check-then-converge pass.
 *
 * A check answers with a CheckOutcome: either the target state already holds
 * (carrying whatever was observed) or it does not (carrying the action that
 * will make it hold). The driver answers with a Convergence, which records
 * which of the two paths was taken.
 */

// ── Check ──────────────────────────────────────────────────────────────

/** The target state already holds; `value` is what the check observed. */
export type Met<M> = { kind: "met"; value: M };

/** The target state does not hold; `meet` converges it. Run only by the driver. */
export type Unmet<A> = { kind: "unmet"; meet: A };

export type CheckOutcome<M, A> = Met<M> | Unmet<A>;

export function met<M>(value: M): Met<M> {
  return { kind: "met", value };
}

export function unmet<A>(meet: A): Unmet<A> {
  return { kind: "unmet", meet };
}

// ── Convergence ────────────────────────────────────────────────────────

export type NothingToDo<N> = { kind: "nothing_to_do"; value: N };

export type NowMet<M> = { kind: "now_met"; value: M };

/** Unified result of `ensure`: `value` is the witness or the action's result. */
export type Convergence<N, M> = NothingToDo<N> | NowMet<M>;

export function nothingToDo<N>(value: N): NothingToDo<N> {
  return { kind: "nothing_to_do", value };
}

export function nowMet<M>(value: M): NowMet<M> {
  return { kind: "now_met", value };
}

/** The carried value, whichever path produced it. */
export function convergedValue<N, M>(convergence: Convergence<N, M>): N | M {
  return convergence.value;
}

/** True when the action ran. */
export function changed<N, M>(convergence: Convergence<N, M>): convergence is NowMet<M> {
  return convergence.kind === "now_met";
}
