import { z } from "zod";
import { ValidationError } from "./errors.js";
import { EVENT_KINDS, TASK_STATUSES } from "./types.js";
import type { Actor, JsonValue } from "./types.js";

const MAX_TITLE_CHARS = 200;
const MAX_TEXT_CHARS = 8_000;
const MAX_TAG_CHARS = 100;
const MAX_LIST_LIMIT = 1_000;

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const ActorSchema = z.object({
  type: z.enum(["human", "agent", "system"]),
  id: z.string().trim().min(1).max(200),
  name: z.string().trim().min(1).max(200),
});

const TagSchema = z.string().trim().max(MAX_TAG_CHARS);
const PrioritySchema = z.number().int().min(1).max(10);
const ReasonSchema = z.string().trim().min(1).max(MAX_TEXT_CHARS);

export const CreateTaskSchema = z.object({
  title: z.string().trim().min(1).max(MAX_TITLE_CHARS),
  description: z.string().max(MAX_TEXT_CHARS).default(""),
  type: TagSchema.default(""),
  channel: TagSchema.default(""),
  priority: PrioritySchema.default(5),
  payload: JsonValueSchema.optional(),
});

export const UpdateTaskSchema = z
  .object({
    title: z.string().trim().min(1).max(MAX_TITLE_CHARS).optional(),
    description: z.string().max(MAX_TEXT_CHARS).optional(),
    priority: PrioritySchema.optional(),
  })
  .refine((v) => v.title !== undefined || v.description !== undefined || v.priority !== undefined, {
    message: "at least one of title, description or priority is required",
  });

export const LeaseSchema = z.number().int().positive();

export const OutputsSchema = JsonValueSchema.optional();

export const RequiredReasonSchema = ReasonSchema;
export const OptionalReasonSchema = ReasonSchema.optional();

export const MessageSchema = z.object({
  content: JsonValueSchema.refine((v) => v !== "" && v !== null, { message: "content must not be empty" }),
  contentType: z.string().trim().min(1).max(MAX_TAG_CHARS).default("text"),
});

export const TaskFilterSchema = z.object({
  status: z.enum(TASK_STATUSES).optional(),
  channel: TagSchema.optional(),
  type: TagSchema.optional(),
  limit: z.number().int().min(1).max(MAX_LIST_LIMIT).optional(),
  includeAll: z.boolean().default(false),
  sort: z.enum(["created", "priority"]).optional(),
});

export const WatchFilterSchema = z.object({
  channel: TagSchema.optional(),
  task_type: TagSchema.optional(),
  event_kinds: z.array(z.enum(EVENT_KINDS)).optional(),
});

export const TaskIdSchema = z.string().trim().min(1).max(200);

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "input"}: ${issue.message}`);
}

/** Parses `input` with `schema`, raising a ValidationError that lists every offending field. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) throw new ValidationError(formatIssues(parsed.error));
  return parsed.data;
}

export function parseStoredActor(json: string): Actor {
  return ActorSchema.parse(JSON.parse(json));
}
