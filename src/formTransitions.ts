import type { FormLifecycleType } from "./formState.js";

/**
 * Error thrown when a session is asked to move between two lifecycle states
 * that the transition table does not connect.
 */
export class InvalidStateTransitionError extends Error {
  public readonly from: FormLifecycleType;
  public readonly to: FormLifecycleType;

  constructor(from: FormLifecycleType, to: FormLifecycleType) {
    super(`Invalid state transition: '${from}' → '${to}'`);
    this.name = "InvalidStateTransitionError";
    this.from = from;
    this.to = to;
  }
}

const RESUBMITTABLE = new Set<FormLifecycleType>(["Loading", "Loaded", "Submitting", "SubmissionFailed"]);

/**
 * Legal successors of each lifecycle state.
 *
 *   Loading ─► Loaded ─► Submitting ─► Success | Failure | SubmissionCancelled
 *      │          │          ▲
 *      ▼          │          └── Failure, SubmissionCancelled, SubmissionFailed, DeleteFailed
 *   LoadFailed    ▼
 *              Deleting ─► DeleteSuccessful | DeleteFailed
 *
 * The value-level transition functions stay total; this table is what the
 * session controller enforces.
 */
export const LIFECYCLE_TRANSITIONS: ReadonlyMap<FormLifecycleType, ReadonlySet<FormLifecycleType>> = new Map([
  ["Loading", new Set<FormLifecycleType>(["Loading", "Loaded", "LoadFailed"])],
  ["LoadFailed", new Set<FormLifecycleType>(["Loading"])],
  ["Loaded", new Set<FormLifecycleType>(["Loading", "Loaded", "Submitting", "SubmissionFailed", "Deleting"])],
  ["Submitting", new Set<FormLifecycleType>(["Submitting", "Success", "Failure", "SubmissionCancelled"])],
  ["Success", new Set<FormLifecycleType>(["Loading", "Loaded"])],
  ["Failure", RESUBMITTABLE],
  ["SubmissionCancelled", RESUBMITTABLE],
  ["SubmissionFailed", RESUBMITTABLE],
  ["Deleting", new Set<FormLifecycleType>(["DeleteSuccessful", "DeleteFailed"])],
  [
    "DeleteFailed",
    new Set<FormLifecycleType>(["Loading", "Loaded", "Submitting", "SubmissionFailed", "Deleting"]),
  ],
  ["DeleteSuccessful", new Set<FormLifecycleType>(["Loading"])],
]);

export function canTransition(from: FormLifecycleType, to: FormLifecycleType): boolean {
  return LIFECYCLE_TRANSITIONS.get(from)?.has(to) ?? false;
}

/**
 * @throws {InvalidStateTransitionError} If `to` is not a legal successor of `from`.
 */
export function assertValidTransition(from: FormLifecycleType, to: FormLifecycleType): void {
  if (!canTransition(from, to)) {
    throw new InvalidStateTransitionError(from, to);
  }
}
