import AjvModule, { type ErrorObject } from "ajv";
import addFormatsModule from "ajv-formats";
import { v4 as uuidv4 } from "uuid";
import {
  canSubmit,
  loading,
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
  type SubmittingState,
} from "./formState.js";
import { InvalidStateTransitionError, assertValidTransition } from "./formTransitions.js";
import type {
  FailureResponse,
  FormDefinition,
  FormFieldState,
  FormSession,
  JsonSchema,
  SessionLifecycleState,
  SuccessResponse,
} from "./formTypes.js";

// ajv and ajv-formats are CommonJS; under Node's ESM loader the default import
// is the whole module.exports object.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;
const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

export type CreateSessionOptions = {
  userId?: string;
  /** Start in update mode instead of create mode. */
  isEditing?: boolean;
};

export class InMemoryFormStore {
  private forms = new Map<string, FormDefinition>();
  private sessions = new Map<string, FormSession>();

  registerForm(def: FormDefinition): void {
    this.forms.set(def.id, def);
  }

  listForms(): FormDefinition[] {
    return [...this.forms.values()];
  }

  getForm(id: string): FormDefinition | undefined {
    return this.forms.get(id);
  }

  /** New sessions start in Loading; call {@link finishLoading} or {@link failLoading} next. */
  createSession(formId: string, options: CreateSessionOptions = {}): FormSession {
    const form = this.forms.get(formId);
    if (!form) throw new Error(`Form not found: ${formId}`);

    const session: FormSession = {
      sessionId: uuidv4(),
      userId: options.userId,
      formId,
      definitionSnapshot: form,
      data: {},
      fields: {},
      state: loading({ isEditing: options.isEditing }),
      questionOrder: deriveQuestionOrder(form.schema),
      currentQuestionIndex: 0,
    };

    this.sessions.set(session.sessionId, session);
    return session;
  }

  getSession(sessionId: string): FormSession | undefined {
    return this.sessions.get(sessionId);
  }

  /** Like {@link getSession}, but throws for an unknown id. */
  requireSession(sessionId: string): FormSession {
    const session = this.sessions.get(sessionId);
    if (!session) throw new Error("Session not found");
    return session;
  }

  listSessions(filter?: { userId?: string }): FormSession[] {
    const all = [...this.sessions.values()];
    if (!filter?.userId) return all;
    return all.filter((s) => s.userId === filter.userId);
  }
}

export function deriveQuestionOrder(schema: JsonSchema, basePath = ""): string[] {
  const paths: string[] = [];
  if (schema.type === "object" && schema.properties) {
    for (const [key, child] of Object.entries(schema.properties)) {
      const childPath = basePath ? `${basePath}.${key}` : key;
      paths.push(childPath, ...deriveQuestionOrder(child, childPath));
    }
  }
  return paths;
}

/**
 * Replaces the session's lifecycle value, checking the move against the
 * transition table first.
 */
function transition(session: FormSession, next: SessionLifecycleState): SessionLifecycleState {
  assertValidTransition(session.state.type, next.type);
  session.state = next;
  return next;
}

function requireSubmitting(session: FormSession): SubmittingState {
  if (session.state.type !== "Submitting") {
    throw new InvalidStateTransitionError(session.state.type, "Submitting");
  }
  return session.state;
}

/**
 * Loading → Loaded. Prefilled values are written and validated; a prefill
 * with at least one value puts the session in edit mode.
 */
export function finishLoading(session: FormSession, prefill?: Record<string, unknown>): SessionLifecycleState {
  if (session.state.type !== "Loading") {
    throw new InvalidStateTransitionError(session.state.type, "Loaded");
  }
  for (const [path, value] of Object.entries(prefill ?? {})) {
    session.data[path] = value;
    session.fields[path] = { path, value, schemaValid: false, messages: [], touched: false };
  }
  runSchemaValidation(session);
  return transition(session, toLoaded(session.state, prefill && Object.keys(prefill).length > 0 ? true : undefined));
}

export function failLoading(session: FormSession, failure?: FailureResponse): SessionLifecycleState {
  return transition(session, toLoadFailed(session.state, failure));
}

export function reload(session: FormSession): SessionLifecycleState {
  return transition(session, toLoading(session.state));
}

export function setFieldValue(session: FormSession, path: string, value: unknown): void {
  session.data[path] = value;
  const existing = session.fields[path];
  session.fields[path] = {
    path,
    value,
    schemaValid: existing?.schemaValid ?? false,
    messages: existing?.messages ?? [],
    touched: true,
  };

  // Revalidate so schemaValid, messages and the lifecycle isValid flag agree
  runSchemaValidation(session);
}

export function moveToNextQuestion(session: FormSession): void {
  if (session.currentQuestionIndex < session.questionOrder.length - 1) {
    session.currentQuestionIndex += 1;
  }
}

export function moveToPreviousQuestion(session: FormSession): void {
  if (session.currentQuestionIndex > 0) {
    session.currentQuestionIndex -= 1;
  }
}

export function getCurrentQuestionPath(session: FormSession): string | null {
  return session.questionOrder[session.currentQuestionIndex] ?? null;
}

/**
 * Validates the grouped session data against the form schema, refreshes
 * per-field results and the lifecycle `isValid` flag, and returns overall
 * validity. The lifecycle variant is left as it is.
 */
export function runSchemaValidation(session: FormSession): boolean {
  const grouped: Record<string, unknown> = {};
  for (const [path, value] of Object.entries(session.data)) {
    setDeepValue(grouped, path, value);
  }

  const validate = ajv.compile(session.definitionSnapshot.schema);
  const valid = validate(grouped);
  const errors: ErrorObject[] = validate.errors ?? [];

  const fieldErrors = new Map<string, string[]>();
  for (const err of errors) {
    const path = errorPath(err);
    fieldErrors.set(path, [...(fieldErrors.get(path) ?? []), err.message ?? "Validation error"]);
  }

  for (const path of session.questionOrder) {
    const existing: FormFieldState = session.fields[path] ?? {
      path,
      value: undefined,
      schemaValid: true,
      messages: [],
      touched: false,
    };
    const errs = fieldErrors.get(path) ?? [];
    session.fields[path] = {
      ...existing,
      schemaValid: errs.length === 0,
      messages: errs,
    };
  }

  session.state = withIsValid(session.state, valid);
  return valid;
}

/**
 * Loaded / Failure / SubmissionCancelled / SubmissionFailed / DeleteFailed →
 * Submitting at progress 0, or SubmissionFailed when the data is invalid.
 */
export function submit(session: FormSession): SessionLifecycleState {
  if (!canSubmit(session.state)) {
    throw new InvalidStateTransitionError(session.state.type, "Submitting");
  }
  const valid = runSchemaValidation(session);
  return transition(session, valid ? toSubmitting(session.state, 0) : toSubmissionFailed(session.state));
}

export function updateSubmissionProgress(session: FormSession, progress: number): SessionLifecycleState {
  return transition(session, toSubmitting(requireSubmitting(session), progress));
}

/** Flags the running submission as cancelling; it stays Submitting until confirmed. */
export function requestCancellation(session: FormSession): SessionLifecycleState {
  return transition(session, withCanceling(requireSubmitting(session)));
}

export function confirmCancellation(session: FormSession): SessionLifecycleState {
  return transition(session, toSubmissionCancelled(session.state));
}

export function completeSubmission(session: FormSession, response?: SuccessResponse): SessionLifecycleState {
  return transition(session, toSuccess(session.state, response));
}

export function failSubmission(session: FormSession, failure?: FailureResponse): SessionLifecycleState {
  return transition(session, toFailure(session.state, failure));
}

export function beginDelete(session: FormSession): SessionLifecycleState {
  return transition(session, toDeleting(session.state));
}

export function completeDelete(session: FormSession, response?: SuccessResponse): SessionLifecycleState {
  return transition(session, toDeleteSuccessful(session.state, response));
}

export function failDelete(session: FormSession, failure?: FailureResponse): SessionLifecycleState {
  return transition(session, toDeleteFailed(session.state, failure));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setDeepValue(target: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  const last = parts.pop();
  if (last === undefined) return;
  let current = target;
  for (const key of parts) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
  current[last] = value;
}

// "required" errors are reported on the parent object; attribute them to the
// missing property instead.
function errorPath(err: ErrorObject): string {
  const base = normalizeAjvPath(err.instancePath);
  const missing: unknown = err.params.missingProperty;
  if (err.keyword === "required" && typeof missing === "string") {
    return base ? `${base}.${missing}` : missing;
  }
  return base;
}

function normalizeAjvPath(instancePath: string): string {
  if (!instancePath) return "";
  const noSlash = instancePath.replace(/^\//, "");
  return noSlash.replace(/\//g, ".");
}
