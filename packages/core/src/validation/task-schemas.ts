import { z } from 'zod';
import { PRIORITY_VALUES } from '../types/priority.js';
import { TASK_STATUS_VALUES } from '../types/task-status.js';
import { TITLE_MAX_LENGTH, DESCRIPTION_MAX_LENGTH } from '../schema/tasks.js';
import { DEFAULT_LIST_LIMIT, MAX_LIST_LIMIT } from '../queries/task-helpers.js';

// ─── Field schemas ──────────────────────────────────────────────────────────

export const PrioritySchema = z.enum(PRIORITY_VALUES);
export const TaskStatusSchema = z.enum(TASK_STATUS_VALUES);

// Length is checked on the trimmed value; blank titles are rejected by the queries
const TitleSchema = z.string().refine(
  (value) => value.trim().length <= TITLE_MAX_LENGTH,
  { message: `Title must be at most ${TITLE_MAX_LENGTH} characters` },
);

const DescriptionSchema = z.string().max(DESCRIPTION_MAX_LENGTH, {
  message: `Description must be at most ${DESCRIPTION_MAX_LENGTH} characters`,
});

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

/** Query-string boolean: true/false, 1/0, yes/no, on/off (any case) */
export const QueryBooleanSchema = z.string().transform((value, ctx) => {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Input should be a valid boolean' });
  return z.NEVER;
});

const INTEGER_MESSAGE = 'Input should be a valid integer';

/** Plain decimal integer text, optionally signed; range checks are left to the caller */
const IntegerTextSchema = z
  .string()
  .trim()
  .regex(/^-?\d+$/, { message: INTEGER_MESSAGE })
  .transform((value) => Number(value));

// ─── Request schemas ────────────────────────────────────────────────────────

export const CreateTaskSchema = z.object({
  title: TitleSchema,
  description: DescriptionSchema.nullish(),
  priority: PrioritySchema.optional(),
  status: TaskStatusSchema.optional(),
});

export const UpdateTaskSchema = z.object({
  title: TitleSchema.nullish(),
  description: DescriptionSchema.nullish(),
  completed: z.boolean().nullish(),
  priority: PrioritySchema.nullish(),
  status: TaskStatusSchema.nullish(),
});

export const ListTasksQuerySchema = z.object({
  skip: IntegerTextSchema.pipe(z.number().min(0).max(Number.MAX_SAFE_INTEGER)).default('0'),
  limit: IntegerTextSchema.pipe(z.number().min(1).max(MAX_LIST_LIMIT)).default(String(DEFAULT_LIST_LIMIT)),
  completed: QueryBooleanSchema.optional(),
});

export const TaskIdParamsSchema = z.object({
  id: IntegerTextSchema.pipe(z.number().safe()),
});

// ─── Response schemas ───────────────────────────────────────────────────────

export const TaskJsonSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  description: z.string().nullable(),
  completed: z.boolean(),
  priority: PrioritySchema,
  status: TaskStatusSchema,
  created_at: z.string(),
  updated_at: z.string(),
});

export const MessageSchema = z.object({
  message: z.string(),
});

export const ServiceInfoSchema = MessageSchema.extend({
  version: z.string(),
});

export const ErrorBodySchema = z.object({
  detail: z.string(),
});

export type ServiceInfo = z.infer<typeof ServiceInfoSchema>;

/** Flatten zod issues into one human-readable line */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
