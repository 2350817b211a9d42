// Result (generic pattern)
export type { Result } from "./result.js";
export { ok, err, unwrap, UnwrapError } from "./result.js";

// Check outcomes and convergence
export type {
  CheckOutcome,
  Met,
  Unmet,
  Convergence,
  NothingToDo,
  NowMet,
} from "./outcome.js";
export { met, unmet, nothingToDo, nowMet, convergedValue, changed } from "./outcome.js";

// Ensurable (sync)
export type { Ensurable, Check, Meet, InfallibleCheck, EnsureTarget } from "./ensurable.js";
export {
  CheckEnsurable,
  fromCheck,
  infallible,
  isEnsurable,
  ensure,
  ensureOrThrow,
} from "./ensurable.js";

// Ensurable (async)
export type {
  AsyncEnsurable,
  AsyncCheck,
  AsyncMeet,
  AsyncEnsureTarget,
} from "./ensurable-async.js";
export { AsyncCheckEnsurable, fromAsyncCheck, ensureAsync } from "./ensurable-async.js";

// Existence witnesses
export type { Existing, NonExisting } from "./existence.js";
export { assumeExisting, assumeNonExisting } from "./existence.js";
