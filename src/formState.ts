/**
 * Lifecycle states of a form session.
 *
 * Every value is frozen. A transition builds a new value from the current
 * one; nothing here mutates its input.
 */

type CommonFields = {
  /** Whether every field of the governed form is currently valid. */
  readonly isValid: boolean;
  /** Always within [0, 1]. */
  readonly submissionProgress: number;
  /** True when the form updates an existing record rather than creating one. */
  readonly isEditing: boolean;
};

export type LoadingState = CommonFields & { readonly type: "Loading" };

export type LoadFailedState<F> = CommonFields & {
  readonly type: "LoadFailed";
  readonly failureResponse?: F;
};

export type LoadedState = CommonFields & { readonly type: "Loaded" };

export type SubmittingState = CommonFields & {
  readonly type: "Submitting";
  readonly isCanceling: boolean;
};

export type SuccessState<S> = CommonFields & {
  readonly type: "Success";
  readonly successResponse?: S;
};

export type FailureState<F> = CommonFields & {
  readonly type: "Failure";
  readonly failureResponse?: F;
};

export type SubmissionCancelledState = CommonFields & { readonly type: "SubmissionCancelled" };

/** Submit was requested while the form was invalid. */
export type SubmissionFailedState = CommonFields & { readonly type: "SubmissionFailed" };

export type DeletingState = CommonFields & { readonly type: "Deleting" };

export type DeleteFailedState<F> = CommonFields & {
  readonly type: "DeleteFailed";
  readonly failureResponse?: F;
};

export type DeleteSuccessfulState<S> = CommonFields & {
  readonly type: "DeleteSuccessful";
  readonly successResponse?: S;
};

export type FormLifecycleState<S = unknown, F = unknown> =
  | LoadingState
  | LoadFailedState<F>
  | LoadedState
  | SubmittingState
  | SuccessState<S>
  | FailureState<F>
  | SubmissionCancelledState
  | SubmissionFailedState
  | DeletingState
  | DeleteFailedState<F>
  | DeleteSuccessfulState<S>;

export type FormLifecycleType = FormLifecycleState["type"];

export const FORM_LIFECYCLE_TYPES: readonly FormLifecycleType[] = [
  "Loading",
  "LoadFailed",
  "Loaded",
  "Submitting",
  "Success",
  "Failure",
  "SubmissionCancelled",
  "SubmissionFailed",
  "Deleting",
  "DeleteFailed",
  "DeleteSuccessful",
];

type Flags = { isValid?: boolean; isEditing?: boolean };

export function assertNever(value: never): never {
  throw new Error(`Unhandled form lifecycle state: ${JSON.stringify(value)}`);
}

/**
 * Restricts a progress value to [0, 1]. Out-of-range input is corrected, not
 * rejected; NaN becomes 0.
 */
export function clampProgress(progress: number): number {
  if (Number.isNaN(progress) || progress < 0) return 0;
  if (progress > 1) return 1;
  return progress;
}

function common(flags: Flags, submissionProgress: number): CommonFields {
  return {
    isValid: flags.isValid ?? false,
    isEditing: flags.isEditing ?? false,
    submissionProgress,
  };
}

export function loading(flags: Flags = {}): LoadingState {
  const state: LoadingState = { type: "Loading", ...common(flags, 0) };
  return Object.freeze(state);
}

// Payload keys are only set when a payload is given; `null` and `undefined`
// both mean absent, so an absent payload and a missing key are the same value.
export function loadFailed<F>(flags: Flags & { failureResponse?: F } = {}): LoadFailedState<F> {
  const state: LoadFailedState<F> = { type: "LoadFailed", ...common(flags, 0) };
  return Object.freeze(
    flags.failureResponse == null ? state : { ...state, failureResponse: flags.failureResponse },
  );
}

export function loaded(flags: Flags = {}): LoadedState {
  const state: LoadedState = { type: "Loaded", ...common(flags, 0) };
  return Object.freeze(state);
}

export function submitting(
  flags: Flags & { submissionProgress: number; isCanceling?: boolean },
): SubmittingState {
  const state: SubmittingState = {
    type: "Submitting",
    ...common(flags, clampProgress(flags.submissionProgress)),
    isCanceling: flags.isCanceling ?? false,
  };
  return Object.freeze(state);
}

export function success<S>(flags: Flags & { successResponse?: S } = {}): SuccessState<S> {
  const state: SuccessState<S> = { type: "Success", ...common(flags, 1) };
  return Object.freeze(
    flags.successResponse == null ? state : { ...state, successResponse: flags.successResponse },
  );
}

export function failure<F>(flags: Flags & { failureResponse?: F } = {}): FailureState<F> {
  const state: FailureState<F> = { type: "Failure", ...common(flags, 0) };
  return Object.freeze(
    flags.failureResponse == null ? state : { ...state, failureResponse: flags.failureResponse },
  );
}

export function submissionCancelled(flags: Flags = {}): SubmissionCancelledState {
  const state: SubmissionCancelledState = { type: "SubmissionCancelled", ...common(flags, 0) };
  return Object.freeze(state);
}

export function submissionFailed(flags: Flags = {}): SubmissionFailedState {
  const state: SubmissionFailedState = { type: "SubmissionFailed", ...common(flags, 0) };
  return Object.freeze(state);
}

export function deleting(flags: Flags = {}): DeletingState {
  const state: DeletingState = { type: "Deleting", ...common(flags, 0) };
  return Object.freeze(state);
}

export function deleteFailed<F>(flags: Flags & { failureResponse?: F } = {}): DeleteFailedState<F> {
  const state: DeleteFailedState<F> = { type: "DeleteFailed", ...common(flags, 0) };
  return Object.freeze(
    flags.failureResponse == null ? state : { ...state, failureResponse: flags.failureResponse },
  );
}

export function deleteSuccessful<S>(flags: Flags & { successResponse?: S } = {}): DeleteSuccessfulState<S> {
  const state: DeleteSuccessfulState<S> = { type: "DeleteSuccessful", ...common(flags, 1) };
  return Object.freeze(
    flags.successResponse == null ? state : { ...state, successResponse: flags.successResponse },
  );
}

/** Loaded, Failure, SubmissionCancelled, SubmissionFailed and DeleteFailed accept a submit. */
export function canSubmit(state: FormLifecycleState<unknown, unknown>): boolean {
  switch (state.type) {
    case "Loaded":
    case "Failure":
    case "SubmissionCancelled":
    case "SubmissionFailed":
    case "DeleteFailed":
      return true;
    default:
      return false;
  }
}

export function canShowProgress(state: FormLifecycleState<unknown, unknown>): boolean {
  return state.type === "Submitting" || state.type === "Success";
}

export function hasSuccessResponse<S, F>(
  state: FormLifecycleState<S, F>,
): state is SuccessState<S> | DeleteSuccessfulState<S> {
  return (state.type === "Success" || state.type === "DeleteSuccessful") && state.successResponse != null;
}

export function hasFailureResponse<S, F>(
  state: FormLifecycleState<S, F>,
): state is LoadFailedState<F> | FailureState<F> | DeleteFailedState<F> {
  return (
    (state.type === "LoadFailed" || state.type === "Failure" || state.type === "DeleteFailed") &&
    state.failureResponse != null
  );
}

export function toLoading<S, F>(state: FormLifecycleState<S, F>): FormLifecycleState<S, F> {
  return loading(state);
}

export function toLoadFailed<S, F>(state: FormLifecycleState<S, F>, failureResponse?: F): FormLifecycleState<S, F> {
  return loadFailed({ isValid: state.isValid, isEditing: state.isEditing, failureResponse });
}

export function toLoaded<S, F>(state: FormLifecycleState<S, F>, isEditing?: boolean): FormLifecycleState<S, F> {
  return loaded({ isValid: state.isValid, isEditing: isEditing ?? state.isEditing });
}

/**
 * Moves to Submitting with `progress` clamped to [0, 1]. A pending
 * cancellation survives only when the current state is already Submitting.
 */
export function toSubmitting<S, F>(state: FormLifecycleState<S, F>, progress: number): FormLifecycleState<S, F> {
  return submitting({
    isValid: state.isValid,
    isEditing: state.isEditing,
    submissionProgress: progress,
    isCanceling: state.type === "Submitting" ? state.isCanceling : false,
  });
}

export function toSuccess<S, F>(state: FormLifecycleState<S, F>, successResponse?: S): FormLifecycleState<S, F> {
  return success({ isValid: state.isValid, isEditing: state.isEditing, successResponse });
}

export function toFailure<S, F>(state: FormLifecycleState<S, F>, failureResponse?: F): FormLifecycleState<S, F> {
  return failure({ isValid: state.isValid, isEditing: state.isEditing, failureResponse });
}

export function toSubmissionCancelled<S, F>(state: FormLifecycleState<S, F>): FormLifecycleState<S, F> {
  return submissionCancelled(state);
}

export function toSubmissionFailed<S, F>(state: FormLifecycleState<S, F>): FormLifecycleState<S, F> {
  return submissionFailed(state);
}

export function toDeleting<S, F>(state: FormLifecycleState<S, F>): FormLifecycleState<S, F> {
  return deleting(state);
}

export function toDeleteFailed<S, F>(state: FormLifecycleState<S, F>, failureResponse?: F): FormLifecycleState<S, F> {
  return deleteFailed({ isValid: state.isValid, isEditing: state.isEditing, failureResponse });
}

export function toDeleteSuccessful<S, F>(
  state: FormLifecycleState<S, F>,
  successResponse?: S,
): FormLifecycleState<S, F> {
  return deleteSuccessful({ isValid: state.isValid, isEditing: state.isEditing, successResponse });
}

/** Marks a running submission as being cancelled. */
export function withCanceling(state: SubmittingState): SubmittingState {
  return submitting({ ...state, isCanceling: true });
}

/** Same variant and payload, with `isValid` replaced. */
export function withIsValid<S, F>(state: FormLifecycleState<S, F>, isValid: boolean): FormLifecycleState<S, F> {
  const flags = { isValid, isEditing: state.isEditing };
  switch (state.type) {
    case "Loading":
      return loading(flags);
    case "LoadFailed":
      return loadFailed({ ...flags, failureResponse: state.failureResponse });
    case "Loaded":
      return loaded(flags);
    case "Submitting":
      return submitting({
        ...flags,
        submissionProgress: state.submissionProgress,
        isCanceling: state.isCanceling,
      });
    case "Success":
      return success({ ...flags, successResponse: state.successResponse });
    case "Failure":
      return failure({ ...flags, failureResponse: state.failureResponse });
    case "SubmissionCancelled":
      return submissionCancelled(flags);
    case "SubmissionFailed":
      return submissionFailed(flags);
    case "Deleting":
      return deleting(flags);
    case "DeleteFailed":
      return deleteFailed({ ...flags, failureResponse: state.failureResponse });
    case "DeleteSuccessful":
      return deleteSuccessful({ ...flags, successResponse: state.successResponse });
    default:
      return assertNever(state);
  }
}

export type PayloadEquals = (a: unknown, b: unknown) => boolean;

/**
 * Structural equality: same tag and same fields for that tag. Payloads are
 * compared with `Object.is` unless `payloadEquals` is given.
 */
export function equals<S, F>(
  a: FormLifecycleState<S, F>,
  b: FormLifecycleState<S, F>,
  payloadEquals: PayloadEquals = Object.is,
): boolean {
  if (
    a.type !== b.type ||
    a.isValid !== b.isValid ||
    a.isEditing !== b.isEditing ||
    a.submissionProgress !== b.submissionProgress
  ) {
    return false;
  }
  switch (a.type) {
    case "Submitting":
      return b.type === "Submitting" && a.isCanceling === b.isCanceling;
    case "Success":
    case "DeleteSuccessful":
      return (
        (b.type === "Success" || b.type === "DeleteSuccessful") &&
        payloadOrAbsentEquals(a.successResponse, b.successResponse, payloadEquals)
      );
    case "LoadFailed":
    case "Failure":
    case "DeleteFailed":
      return (
        (b.type === "LoadFailed" || b.type === "Failure" || b.type === "DeleteFailed") &&
        payloadOrAbsentEquals(a.failureResponse, b.failureResponse, payloadEquals)
      );
    case "Loading":
    case "Loaded":
    case "SubmissionCancelled":
    case "SubmissionFailed":
    case "Deleting":
      return true;
    default:
      return assertNever(a);
  }
}

function payloadOrAbsentEquals(a: unknown, b: unknown, payloadEquals: PayloadEquals): boolean {
  if (a == null || b == null) return (a == null) === (b == null);
  return payloadEquals(a, b);
}

function formatProgress(progress: number): string {
  return Number.isInteger(progress) ? progress.toFixed(1) : String(progress);
}

export function formatPayload(payload: unknown): string {
  if (typeof payload === "string") return payload;
  if (typeof payload !== "object" || payload === null) return String(payload);
  if (
    Array.isArray(payload) ||
    typeof payload.toString !== "function" ||
    payload.toString === Object.prototype.toString
  ) {
    try {
      return JSON.stringify(payload);
    } catch {
      // cyclic or bigint-holding payloads have no JSON form
      return typeof payload.toString === "function" ? String(payload) : Object.prototype.toString.call(payload);
    }
  }
  return payload.toString();
}

/**
 * Renders `<Type> { isValid: <bool>, isEditing: <bool>, submissionProgress: <double> }`,
 * with a present payload (or an active cancellation) inserted before the
 * closing brace.
 */
export function describe(state: FormLifecycleState<unknown, unknown>): string {
  let text = `${state.type} { isValid: ${state.isValid}, isEditing: ${state.isEditing}, submissionProgress: ${formatProgress(state.submissionProgress)}`;
  if (state.type === "Submitting" && state.isCanceling) {
    text += `, isCancelling: ${state.isCanceling}`;
  }
  if (hasFailureResponse(state)) {
    text += `, failureResponse: ${formatPayload(state.failureResponse)}`;
  }
  if (hasSuccessResponse(state)) {
    text += `, successResponse: ${formatPayload(state.successResponse)}`;
  }
  return `${text} }`;
}
