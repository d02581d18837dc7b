import type { FormLifecycleState } from "./formState.js";

export type JsonSchema = {
  $id?: string;
  $schema?: string;
  title?: string;
  description?: string;
  type?: string | string[];
  properties?: Record<string, JsonSchema>;
  items?: JsonSchema | JsonSchema[];
  required?: string[];
  enum?: unknown[];
  [key: string]: unknown;
};

export type FormFieldState = {
  path: string; // dot path
  value: unknown;
  /** JSON Schema structural validity */
  schemaValid: boolean;
  /** Textual feedback from the schema validator */
  messages: string[];
  /** Whether the field has ever been touched/edited */
  touched: boolean;
};

export type FormDefinition = {
  id: string;
  name: string;
  schema: JsonSchema;
};

/** Payload attached to Success / DeleteSuccessful by whoever completes the operation. */
export type SuccessResponse = unknown;

/** Payload attached to LoadFailed / Failure / DeleteFailed. */
export type FailureResponse = unknown;

export type SessionLifecycleState = FormLifecycleState<SuccessResponse, FailureResponse>;

export type FormSession = {
  sessionId: string;
  formId: string;
  userId?: string;
  definitionSnapshot: FormDefinition;
  data: Record<string, unknown>;
  fields: Record<string, FormFieldState>;
  /** Current lifecycle value; replaced, never mutated, on each transition. */
  state: SessionLifecycleState;
  /**
   * A linearized list of form field paths representing the question order.
   */
  questionOrder: string[];
  currentQuestionIndex: number;
};
