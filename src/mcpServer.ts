import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import * as fs from "fs";
import * as path from "path";
import { loadConfig } from "./config.js";
import {
  InMemoryFormStore,
  beginDelete,
  completeDelete,
  completeSubmission,
  confirmCancellation,
  failDelete,
  failLoading,
  failSubmission,
  finishLoading,
  getCurrentQuestionPath,
  moveToNextQuestion,
  moveToPreviousQuestion,
  reload,
  requestCancellation,
  runSchemaValidation,
  setFieldValue,
  submit,
  updateSubmissionProgress,
} from "./formEngine.js";
import {
  assertNever,
  canShowProgress,
  canSubmit,
  describe,
  hasFailureResponse,
  hasSuccessResponse,
  type FormLifecycleType,
} from "./formState.js";
import type { FormDefinition, FormSession, JsonSchema } from "./formTypes.js";

// Example demo form so the agent has something to work with.
export const demoForm: FormDefinition = {
  id: "demo-contact",
  name: "Demo Contact Form",
  schema: {
    type: "object",
    properties: {
      fullName: { type: "string" },
      age: { type: "integer", minimum: 0 },
      email: { type: "string", format: "email" },
      bio: { type: "string" },
    },
    required: ["fullName", "email"],
  },
};

const JsonSchemaShape = z.custom<JsonSchema>(
  (value) => typeof value === "object" && value !== null && !Array.isArray(value),
  { message: "schema must be an object" },
);

const FormDefinitionFile = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  schema: JsonSchemaShape,
});

/** Registers every `*.json` form definition in `dir`; bad files are logged and skipped. */
export function loadFormsFromDir(store: InMemoryFormStore, dir: string): number {
  if (!fs.existsSync(dir)) {
    console.warn(`Forms directory not found at ${dir}`);
    return 0;
  }

  let registered = 0;
  for (const file of fs.readdirSync(dir)) {
    if (!file.endsWith(".json")) continue;
    try {
      const content = fs.readFileSync(path.join(dir, file), "utf-8");
      const formDef = FormDefinitionFile.parse(JSON.parse(content));
      store.registerForm(formDef);
      registered += 1;
      console.error(`Registered form: ${formDef.id} from ${file}`);
    } catch (err: unknown) {
      console.error(`Failed to load form ${file}: ${errorMessage(err)}`);
    }
  }
  return registered;
}

export type SessionSummary = {
  sessionId: string;
  formId: string;
  userId?: string;
  state: FormLifecycleType;
  description: string;
  isValid: boolean;
  isEditing: boolean;
  submissionProgress: number;
  isCanceling: boolean;
  canSubmit: boolean;
  canShowProgress: boolean;
  successResponse?: unknown;
  failureResponse?: unknown;
  currentQuestionPath: string | null;
};

export function summarizeSession(session: FormSession): SessionSummary {
  const { state } = session;
  return {
    sessionId: session.sessionId,
    formId: session.formId,
    userId: session.userId,
    state: state.type,
    description: describe(state),
    isValid: state.isValid,
    isEditing: state.isEditing,
    submissionProgress: state.submissionProgress,
    isCanceling: state.type === "Submitting" && state.isCanceling,
    canSubmit: canSubmit(state),
    canShowProgress: canShowProgress(state),
    successResponse: hasSuccessResponse(state) ? state.successResponse : undefined,
    failureResponse: hasFailureResponse(state) ? state.failureResponse : undefined,
    currentQuestionPath: getCurrentQuestionPath(session),
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function textResult(text: string, isError = false): CallToolResult {
  return isError ? { content: [{ type: "text", text }], isError } : { content: [{ type: "text", text }] };
}

type ToolInputSchema = {
  type: "object";
  properties: Record<string, object>;
  required?: string[];
};

type RegisteredTool = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  handler: (args: Record<string, unknown>) => Promise<unknown>;
};

const sessionIdInput: ToolInputSchema = {
  type: "object",
  properties: {
    sessionId: { type: "string" },
  },
  required: ["sessionId"],
};

export type CreateServerOptions = {
  store: InMemoryFormStore;
  name?: string;
  version?: string;
};

/** Builds the MCP server and its tools; the caller connects a transport. */
export function createServer({ store, name = "form-lifecycle-mcp", version = "0.1.0" }: CreateServerOptions): Server {
  const server = new Server(
    { name, version },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  const registeredTools = new Map<string, RegisteredTool>();

  function registerTool<In extends z.ZodTypeAny>(
    toolName: string,
    description: string,
    inputSchema: In,
    jsonSchema: ToolInputSchema,
    handler: (input: z.infer<In>) => unknown,
  ): void {
    registeredTools.set(toolName, {
      name: toolName,
      description,
      inputSchema: jsonSchema,
      handler: async (args) => handler(inputSchema.parse(args)),
    });
  }

  function logState(session: FormSession): void {
    console.error(`[${session.sessionId}] ${describe(session.state)}`);
  }

  // Session tools share this shape: look the session up, apply one
  // controller operation, report the new summary.
  function registerSessionTool<In extends z.ZodType<{ sessionId: string }>>(
    toolName: string,
    description: string,
    inputSchema: In,
    jsonSchema: ToolInputSchema,
    apply: (session: FormSession, input: z.infer<In>) => void,
  ): void {
    registerTool(toolName, description, inputSchema, jsonSchema, (input: z.infer<In>) => {
      const session = store.requireSession(input.sessionId);
      apply(session, input);
      logState(session);
      return { session: summarizeSession(session) };
    });
  }

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [...registeredTools.values()].map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: t.inputSchema,
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request): Promise<CallToolResult> => {
    const { name: toolName, arguments: args } = request.params;
    const tool = registeredTools.get(toolName);
    if (!tool) {
      return textResult(`Error: Tool not found: ${toolName}`, true);
    }
    try {
      const result = await tool.handler(args ?? {});
      return textResult(JSON.stringify(result, null, 2));
    } catch (err: unknown) {
      return textResult(`Error: ${errorMessage(err)}`, true);
    }
  });

  registerTool(
    "list_forms",
    "List all available form definitions.",
    z.object({}),
    { type: "object", properties: {} },
    () => ({
      forms: store.listForms().map((f) => ({
        id: f.id,
        name: f.name,
        title: f.schema.title,
        description: f.schema.description,
      })),
    }),
  );

  registerTool(
    "start_form_session",
    "Start a new form session (in the Loading state) for a form id, optionally for a user and in edit mode.",
    z.object({
      formId: z.string(),
      userId: z.string().optional(),
      isEditing: z.boolean().optional(),
    }),
    {
      type: "object",
      properties: {
        formId: { type: "string" },
        userId: { type: "string" },
        isEditing: { type: "boolean" },
      },
      required: ["formId"],
    },
    ({ formId, userId, isEditing }) => {
      const session = store.createSession(formId, { userId, isEditing });
      logState(session);
      return { session: summarizeSession(session) };
    },
  );

  registerTool(
    "list_user_forms",
    "List all form sessions associated with a specific user.",
    z.object({ userId: z.string() }),
    {
      type: "object",
      properties: {
        userId: { type: "string" },
      },
      required: ["userId"],
    },
    ({ userId }) => ({
      sessions: store.listSessions({ userId }).map(summarizeSession),
    }),
  );

  registerTool(
    "get_form_state",
    "Get full state for a form session, including its lifecycle state and field-level validity.",
    z.object({ sessionId: z.string() }),
    sessionIdInput,
    ({ sessionId }) => {
      const session = store.requireSession(sessionId);
      return {
        session: summarizeSession(session),
        data: session.data,
        fields: session.fields,
      };
    },
  );

  registerTool(
    "set_field_value",
    "Set or update the answer for a specific field path within a session.",
    z.object({
      sessionId: z.string(),
      path: z.string(),
      value: z.unknown(),
    }),
    {
      type: "object",
      properties: {
        sessionId: { type: "string" },
        path: { type: "string" },
        value: {},
      },
      required: ["sessionId", "path", "value"],
    },
    ({ sessionId, path: fieldPath, value }) => {
      const session = store.requireSession(sessionId);
      setFieldValue(session, fieldPath, value);
      return { session: summarizeSession(session), field: session.fields[fieldPath] };
    },
  );

  registerSessionTool(
    "next_question",
    "Move to the next question in the session.",
    z.object({ sessionId: z.string() }),
    sessionIdInput,
    (session) => moveToNextQuestion(session),
  );

  registerSessionTool(
    "previous_question",
    "Move to the previous question in the session.",
    z.object({ sessionId: z.string() }),
    sessionIdInput,
    (session) => moveToPreviousQuestion(session),
  );

  registerTool(
    "validate_form",
    "Run JSON Schema validation for the session and refresh its validity flag.",
    z.object({ sessionId: z.string() }),
    sessionIdInput,
    ({ sessionId }) => {
      const session = store.requireSession(sessionId);
      const valid = runSchemaValidation(session);
      return {
        valid,
        session: summarizeSession(session),
        fields: session.fields,
      };
    },
  );

  registerSessionTool(
    "finish_loading",
    "Finish loading a session (Loading → Loaded), optionally prefilling field values for editing.",
    z.object({
      sessionId: z.string(),
      prefill: z.record(z.unknown()).optional(),
    }),
    {
      type: "object",
      properties: {
        sessionId: { type: "string" },
        prefill: { type: "object" },
      },
      required: ["sessionId"],
    },
    (session, { prefill }) => finishLoading(session, prefill),
  );

  registerSessionTool(
    "fail_loading",
    "Mark loading as failed (Loading → LoadFailed) with an optional failure payload.",
    z.object({
      sessionId: z.string(),
      failure: z.unknown().optional(),
    }),
    {
      type: "object",
      properties: {
        sessionId: { type: "string" },
        failure: {},
      },
      required: ["sessionId"],
    },
    (session, { failure }) => failLoading(session, failure),
  );

  registerSessionTool(
    "reload_form",
    "Reload a session (→ Loading).",
    z.object({ sessionId: z.string() }),
    sessionIdInput,
    (session) => reload(session),
  );

  registerSessionTool(
    "submit_form",
    "Submit the form. Invalid data yields SubmissionFailed; valid data starts Submitting at progress 0.",
    z.object({ sessionId: z.string() }),
    sessionIdInput,
    (session) => submit(session),
  );

  registerSessionTool(
    "update_submission_progress",
    "Report submission progress; values outside [0, 1] are clamped.",
    z.object({
      sessionId: z.string(),
      progress: z.number(),
    }),
    {
      type: "object",
      properties: {
        sessionId: { type: "string" },
        progress: { type: "number" },
      },
      required: ["sessionId", "progress"],
    },
    (session, { progress }) => updateSubmissionProgress(session, progress),
  );

  registerSessionTool(
    "cancel_submission",
    "Request cancellation of the running submission.",
    z.object({ sessionId: z.string() }),
    sessionIdInput,
    (session) => requestCancellation(session),
  );

  registerSessionTool(
    "resolve_submission",
    "Finish the running submission as success, failure or cancelled, with an optional response payload.",
    z.object({
      sessionId: z.string(),
      outcome: z.enum(["success", "failure", "cancelled"]),
      response: z.unknown().optional(),
    }),
    {
      type: "object",
      properties: {
        sessionId: { type: "string" },
        outcome: { type: "string", enum: ["success", "failure", "cancelled"] },
        response: {},
      },
      required: ["sessionId", "outcome"],
    },
    (session, { outcome, response }) => {
      switch (outcome) {
        case "success":
          completeSubmission(session, response);
          return;
        case "failure":
          failSubmission(session, response);
          return;
        case "cancelled":
          confirmCancellation(session);
          return;
        default:
          assertNever(outcome);
      }
    },
  );

  registerSessionTool(
    "delete_form",
    "Start deleting the record behind the session (→ Deleting).",
    z.object({ sessionId: z.string() }),
    sessionIdInput,
    (session) => beginDelete(session),
  );

  registerSessionTool(
    "resolve_deletion",
    "Finish the running deletion as success or failure, with an optional response payload.",
    z.object({
      sessionId: z.string(),
      outcome: z.enum(["success", "failure"]),
      response: z.unknown().optional(),
    }),
    {
      type: "object",
      properties: {
        sessionId: { type: "string" },
        outcome: { type: "string", enum: ["success", "failure"] },
        response: {},
      },
      required: ["sessionId", "outcome"],
    },
    (session, { outcome, response }) => {
      if (outcome === "success") {
        completeDelete(session, response);
      } else {
        failDelete(session, response);
      }
    },
  );

  return server;
}

export async function run(): Promise<void> {
  const config = loadConfig();
  const store = new InMemoryFormStore();
  store.registerForm(demoForm);
  loadFormsFromDir(store, config.formsDir);

  const server = createServer({ store, name: config.serverName, version: config.serverVersion });
  await server.connect(new StdioServerTransport());
}
