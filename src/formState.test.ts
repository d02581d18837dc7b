import { describe, expect, it } from "vitest";
import {
  FORM_LIFECYCLE_TYPES,
  canShowProgress,
  canSubmit,
  clampProgress,
  deleteFailed,
  deleteSuccessful,
  deleting,
  describe as describeState,
  equals,
  failure,
  formatPayload,
  hasFailureResponse,
  hasSuccessResponse,
  loadFailed,
  loaded,
  loading,
  submissionCancelled,
  submissionFailed,
  submitting,
  success,
  toDeleteFailed,
  toDeleteSuccessful,
  toDeleting,
  toFailure,
  toLoadFailed,
  toLoaded,
  toLoading,
  toSubmissionCancelled,
  toSubmissionFailed,
  toSubmitting,
  toSuccess,
  withCanceling,
  withIsValid,
  type FormLifecycleState,
  type FormLifecycleType,
} from "./formState.js";

type State = FormLifecycleState<string, string>;

const samples = {
  Loading: loading({ isValid: true }),
  LoadFailed: loadFailed({ isValid: true, failureResponse: "load" }),
  Loaded: loaded({ isValid: true }),
  Submitting: submitting({ isValid: true, submissionProgress: 0.5, isCanceling: true }),
  Success: success({ isValid: true, successResponse: "ok" }),
  Failure: failure({ isValid: true, failureResponse: "fail" }),
  SubmissionCancelled: submissionCancelled({ isValid: true }),
  SubmissionFailed: submissionFailed({ isValid: true }),
  Deleting: deleting({ isValid: true }),
  DeleteFailed: deleteFailed({ isValid: true, failureResponse: "del" }),
  DeleteSuccessful: deleteSuccessful({ isValid: true, successResponse: "gone" }),
} satisfies Record<FormLifecycleType, State>;

const allStates: State[] = FORM_LIFECYCLE_TYPES.map((type) => samples[type]);

describe("constructors", () => {
  it("defaults flags to false and fixes progress per variant", () => {
    expect(loading()).toEqual({ type: "Loading", isValid: false, isEditing: false, submissionProgress: 0 });
    expect(success().submissionProgress).toBe(1);
    expect(deleteSuccessful().submissionProgress).toBe(1);
    expect(failure().submissionProgress).toBe(0);
    expect(deleteFailed().submissionProgress).toBe(0);
    expect(submitting({ submissionProgress: 0.3 }).isCanceling).toBe(false);
  });

  it("returns frozen values", () => {
    for (const state of allStates) {
      expect(Object.isFrozen(state)).toBe(true);
    }
  });

  it("leaves the payload key out when no payload is given", () => {
    expect("failureResponse" in loadFailed()).toBe(false);
    expect("successResponse" in success()).toBe(false);
    expect("failureResponse" in loadFailed({ failureResponse: "x" })).toBe(true);
  });
});

describe("clampProgress", () => {
  it.each([
    [-1, 0],
    [-0.0001, 0],
    [1.5, 1],
    [100, 1],
    [Number.POSITIVE_INFINITY, 1],
    [Number.NEGATIVE_INFINITY, 0],
    [Number.NaN, 0],
    [0.42, 0.42],
  ])("clamps %s to %s", (input, expected) => {
    expect(clampProgress(input)).toBe(expected);
    expect(submitting({ submissionProgress: input }).submissionProgress).toBe(expected);
  });
});

describe("canSubmit", () => {
  const expected: Record<FormLifecycleType, boolean> = {
    Loading: false,
    LoadFailed: false,
    Loaded: true,
    Submitting: false,
    Success: false,
    Failure: true,
    SubmissionCancelled: true,
    SubmissionFailed: true,
    Deleting: false,
    DeleteFailed: true,
    DeleteSuccessful: false,
  };

  it.each(FORM_LIFECYCLE_TYPES)("%s", (type) => {
    expect(canSubmit(samples[type])).toBe(expected[type]);
  });

  it("ignores validity", () => {
    expect(canSubmit(submissionFailed({ isValid: false }))).toBe(true);
    expect(canSubmit(loading({ isValid: true }))).toBe(false);
  });
});

describe("canShowProgress", () => {
  it.each(FORM_LIFECYCLE_TYPES)("%s", (type) => {
    expect(canShowProgress(samples[type])).toBe(type === "Submitting" || type === "Success");
  });
});

describe("payload presence", () => {
  it("reports instance presence, including falsy payloads", () => {
    expect(hasFailureResponse(failure({ failureResponse: 0 }))).toBe(true);
    expect(hasFailureResponse(failure())).toBe(false);
    expect(hasSuccessResponse(success({ successResponse: "" }))).toBe(true);
    expect(hasSuccessResponse(deleteSuccessful())).toBe(false);
  });

  it("treats a null payload as absent", () => {
    const succeeded = success({ successResponse: null });
    expect("successResponse" in succeeded).toBe(false);
    expect(hasSuccessResponse(succeeded)).toBe(false);
    expect(describeState(succeeded)).toBe("Success { isValid: false, isEditing: false, submissionProgress: 1.0 }");
    expect(equals(succeeded, success())).toBe(true);

    const failed = failure({ failureResponse: null });
    expect("failureResponse" in failed).toBe(false);
    expect(hasFailureResponse(failed)).toBe(false);
    expect(describeState(failed)).toBe("Failure { isValid: false, isEditing: false, submissionProgress: 0.0 }");
    expect(equals(failed, failure())).toBe(true);
  });

  it("is false for variants without that payload", () => {
    expect(hasFailureResponse(samples.Success)).toBe(false);
    expect(hasSuccessResponse(samples.Failure)).toBe(false);
    expect(hasSuccessResponse(samples.Loaded)).toBe(false);
  });
});

describe("transitions", () => {
  const editing = loaded({ isValid: true, isEditing: true });

  it("carries isValid and isEditing into every target", () => {
    const targets: FormLifecycleState[] = [
      toLoading(editing),
      toLoadFailed(editing, "x"),
      toLoaded(editing),
      toSubmitting(editing, 0.2),
      toSuccess(editing, "ok"),
      toFailure(editing, "no"),
      toSubmissionCancelled(editing),
      toSubmissionFailed(editing),
      toDeleting(editing),
      toDeleteFailed(editing, "no"),
      toDeleteSuccessful(editing, "ok"),
    ];
    expect(targets.map((s) => s.type)).toEqual(FORM_LIFECYCLE_TYPES);
    for (const target of targets) {
      expect(target.isValid).toBe(true);
      expect(target.isEditing).toBe(true);
    }
  });

  it("fixes progress for terminal submission and deletion states", () => {
    const running = submitting({ submissionProgress: 0.7 });
    expect(toSuccess(running).submissionProgress).toBe(1);
    expect(toDeleteSuccessful(running).submissionProgress).toBe(1);
    expect(toFailure(running).submissionProgress).toBe(0);
    expect(toDeleteFailed(running).submissionProgress).toBe(0);
    expect(toSubmissionCancelled(running).submissionProgress).toBe(0);
    expect(toLoading(running).submissionProgress).toBe(0);
  });

  it("attaches payloads", () => {
    expect(toLoadFailed(loading(), "offline")).toEqual(loadFailed({ failureResponse: "offline" }));
    expect(toSuccess(submitting({ submissionProgress: 1 }), { id: 3 })).toEqual(
      success({ successResponse: { id: 3 } }),
    );
  });

  it("overrides isEditing in toLoaded only when asked", () => {
    expect(toLoaded(editing).isEditing).toBe(true);
    expect(toLoaded(editing, false).isEditing).toBe(false);
    expect(toLoaded(loading(), true).isEditing).toBe(true);
  });

  it("moves Loaded to Submitting without a cancellation", () => {
    expect(toSubmitting(loaded({ isValid: true }), 0.5)).toEqual(
      submitting({ isValid: true, submissionProgress: 0.5, isCanceling: false }),
    );
  });

  it("keeps a pending cancellation only across Submitting states", () => {
    const cancelling = withCanceling(submitting({ submissionProgress: 0.2 }));
    const next = toSubmitting(cancelling, 0.6);
    expect(next).toEqual(submitting({ submissionProgress: 0.6, isCanceling: true }));

    for (const state of allStates.filter((s) => s.type !== "Submitting")) {
      const result = toSubmitting(state, 0.1);
      expect(result.type).toBe("Submitting");
      expect(result.type === "Submitting" && result.isCanceling).toBe(false);
    }
  });

  it("clamps progress passed to toSubmitting", () => {
    expect(toSubmitting(loaded(), 3).submissionProgress).toBe(1);
    expect(toSubmitting(loaded(), -2).submissionProgress).toBe(0);
  });

  it("does not touch the current state", () => {
    const current = failure({ isValid: true, failureResponse: "x" });
    toSubmitting(current, 0.4);
    withIsValid(current, false);
    expect(current).toEqual({
      type: "Failure",
      isValid: true,
      isEditing: false,
      submissionProgress: 0,
      failureResponse: "x",
    });
  });
});

describe("withIsValid", () => {
  it("replaces only isValid", () => {
    expect(withIsValid(loadFailed({ isValid: false, failureResponse: "x" }), true)).toEqual(
      loadFailed({ isValid: true, failureResponse: "x" }),
    );
  });

  it.each(FORM_LIFECYCLE_TYPES)("keeps tag and other fields of %s", (type) => {
    const original = samples[type];
    const copy = withIsValid(original, false);
    expect(copy).toEqual({ ...original, isValid: false });
    expect(equals(withIsValid(copy, false), copy)).toBe(true);
  });

  it("keeps progress and cancellation of Submitting", () => {
    const copy = withIsValid(submitting({ submissionProgress: 0.35, isCanceling: true }), true);
    expect(copy).toEqual(submitting({ isValid: true, submissionProgress: 0.35, isCanceling: true }));
  });
});

describe("equals", () => {
  it("compares independently built values structurally", () => {
    const a = loaded({ isValid: true, isEditing: false });
    const b = loaded({ isValid: true, isEditing: false });
    const c = loaded({ isValid: true });
    expect(equals(a, a)).toBe(true);
    expect(equals(a, b)).toBe(true);
    expect(equals(b, a)).toBe(true);
    expect(equals(b, c)).toBe(true);
    expect(equals(a, c)).toBe(true);
  });

  it("distinguishes variants with matching shared fields", () => {
    expect(equals(loaded({ isValid: true }), loading({ isValid: true }))).toBe(false);
    expect(equals(success({ successResponse: "x" }), deleteSuccessful({ successResponse: "x" }))).toBe(false);
  });

  it("compares variant-specific fields", () => {
    expect(equals(submitting({ submissionProgress: 0.5 }), submitting({ submissionProgress: 0.6 }))).toBe(false);
    expect(
      equals(submitting({ submissionProgress: 0.5 }), submitting({ submissionProgress: 0.5, isCanceling: true })),
    ).toBe(false);
    expect(equals(failure({ failureResponse: "a" }), failure({ failureResponse: "b" }))).toBe(false);
    expect(equals(failure({ failureResponse: "a" }), failure())).toBe(false);
    expect(equals(failure(), failure())).toBe(true);
  });

  it("uses the given payload comparator", () => {
    const a = deleteFailed({ failureResponse: { code: 409 } });
    const b = deleteFailed({ failureResponse: { code: 409 } });
    expect(equals(a, b)).toBe(false);
    expect(equals(a, b, (x, y) => JSON.stringify(x) === JSON.stringify(y))).toBe(true);
  });
});

describe("describe", () => {
  it("renders the common fields", () => {
    expect(describeState(loading())).toBe("Loading { isValid: false, isEditing: false, submissionProgress: 0.0 }");
    expect(describeState(loaded({ isValid: true, isEditing: true }))).toBe(
      "Loaded { isValid: true, isEditing: true, submissionProgress: 0.0 }",
    );
    expect(describeState(success())).toBe("Success { isValid: false, isEditing: false, submissionProgress: 1.0 }");
  });

  it("renders fractional progress and an active cancellation", () => {
    expect(describeState(submitting({ submissionProgress: 0.25 }))).toBe(
      "Submitting { isValid: false, isEditing: false, submissionProgress: 0.25 }",
    );
    expect(describeState(submitting({ isValid: true, submissionProgress: 0.25, isCanceling: true }))).toBe(
      "Submitting { isValid: true, isEditing: false, submissionProgress: 0.25, isCancelling: true }",
    );
  });

  it("renders payloads only when present", () => {
    expect(describeState(loadFailed({ failureResponse: "x" }))).toBe(
      "LoadFailed { isValid: false, isEditing: false, submissionProgress: 0.0, failureResponse: x }",
    );
    expect(describeState(deleteFailed())).toBe(
      "DeleteFailed { isValid: false, isEditing: false, submissionProgress: 0.0 }",
    );
    expect(describeState(deleteSuccessful({ successResponse: { id: 7 } }))).toBe(
      'DeleteSuccessful { isValid: false, isEditing: false, submissionProgress: 1.0, successResponse: {"id":7} }',
    );
    expect(describeState(failure({ failureResponse: new Error("boom") }))).toBe(
      "Failure { isValid: false, isEditing: false, submissionProgress: 0.0, failureResponse: Error: boom }",
    );
  });

  it("renders a cyclic payload without throwing", () => {
    const cyclic: { id: number; self?: unknown } = { id: 1 };
    cyclic.self = cyclic;
    expect(describeState(failure({ failureResponse: cyclic }))).toBe(
      "Failure { isValid: false, isEditing: false, submissionProgress: 0.0, failureResponse: [object Object] }",
    );
  });

  it("is deterministic", () => {
    for (const state of allStates) {
      expect(describeState(withIsValid(state, state.isValid))).toBe(describeState(state));
    }
  });
});

describe("formatPayload", () => {
  // null never reaches here from describe, which treats it as absent
  it.each<[unknown, string]>([
    ["text", "text"],
    [42, "42"],
    [false, "false"],
    [null, "null"],
    [[1, 2], "[1,2]"],
    [{ a: "b" }, '{"a":"b"}'],
  ])("formats %j", (payload, expected) => {
    expect(formatPayload(payload)).toBe(expected);
  });

  it("uses a custom toString", () => {
    const payload = { toString: () => "custom" };
    expect(formatPayload(payload)).toBe("custom");
  });

  it("falls back to String for payloads with no JSON form", () => {
    expect(formatPayload({ id: 10n })).toBe("[object Object]");
  });
});
