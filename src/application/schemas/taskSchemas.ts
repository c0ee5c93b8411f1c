import { z } from "zod";
import { TASK_CATEGORIES, TASK_PRIORITIES, TASK_STATUSES } from "../../domain/task/entities/Task.js";
import { ValidationError } from "../../domain/task/errors.js";

export const MAX_TAGS = 10;

/**
 * Length in characters (code points), so an emoji counts once
 */
export function codePointLength(value: string): number {
    return Array.from(value).length;
}

function textSchema(min: number, max: number) {
    return z.string().superRefine((value, ctx) => {
        const length = codePointLength(value);
        if (length < min) {
            ctx.addIssue({
                code: z.ZodIssueCode.too_small,
                type: "string",
                minimum: min,
                inclusive: true,
                message: `String must contain at least ${min} character(s)`
            });
        }
        if (length > max) {
            ctx.addIssue({
                code: z.ZodIssueCode.too_big,
                type: "string",
                maximum: max,
                inclusive: true,
                message: `String must contain at most ${max} character(s)`
            });
        }
    });
}

// Path and query integers: a number, or a string of decimal digits only
const wholeNumberSchema = z.union([
    z.number(),
    z.string().regex(/^\d+$/, "Expected a decimal integer").transform(Number)
]);

export const taskIdSchema = wholeNumberSchema.pipe(z.number().int().positive()).describe("The ID of the task.");
export const titleSchema = textSchema(3, 200).describe("Task title (3-200 characters)");
export const descriptionSchema = textSchema(0, 2000).describe("Description text");
export const taskStatusSchema = z.enum(TASK_STATUSES).describe("Task status");
export const prioritySchema = z.enum(TASK_PRIORITIES).describe("Priority level");
export const categorySchema = z.enum(TASK_CATEGORIES).describe("Task category");
export const assigneeSchema = textSchema(0, 100).describe("Person the task is assigned to");
export const hoursSchema = z.number().min(0).max(1000).describe("Hours (0-1000)");
export const tagsSchema = z.array(z.string()).max(MAX_TAGS, `Maximum ${MAX_TAGS} tags allowed`).describe("Tags");
export const dependenciesSchema = z.array(z.number().int().positive()).describe("IDs of tasks this task depends on");

export const createTaskSchema = z.object({
    title: titleSchema,
    description: descriptionSchema.nullish(),
    priority: prioritySchema.default('medium'),
    category: categorySchema,
    assignee: assigneeSchema.nullish(),
    estimated_hours: hoursSchema.nullish(),
    tags: tagsSchema.default([]),
    dependencies: dependenciesSchema.default([])
});

// Omitted keys stay untouched; explicit null clears a nullable field
export const updateTaskSchema = z.object({
    title: titleSchema.optional(),
    description: descriptionSchema.nullable().optional(),
    status: taskStatusSchema.optional(),
    priority: prioritySchema.optional(),
    category: categorySchema.optional(),
    assignee: assigneeSchema.nullable().optional(),
    estimated_hours: hoursSchema.nullable().optional(),
    actual_hours: hoursSchema.nullable().optional(),
    tags: tagsSchema.optional(),
    dependencies: dependenciesSchema.optional()
});

export const sortFieldSchema = z.enum(['created_at', 'priority', 'status', 'updated_at']);
export const sortOrderSchema = z.enum(['asc', 'desc']);

export const listTasksQuerySchema = z.object({
    status: taskStatusSchema.optional(),
    priority: prioritySchema.optional(),
    category: categorySchema.optional(),
    assignee: z.string().optional(),
    tags: z.string().optional().describe("Comma-separated tags"),
    sort_by: sortFieldSchema.default('created_at'),
    order: sortOrderSchema.default('desc'),
    limit: wholeNumberSchema.pipe(z.number().int().min(1).max(1000)).default(100),
    offset: wholeNumberSchema.pipe(z.number().int().min(0)).default(0)
});

export type CreateTaskInput = z.input<typeof createTaskSchema>;
export type CreateTaskParams = z.output<typeof createTaskSchema>;
export type UpdateTaskInput = z.input<typeof updateTaskSchema>;
export type UpdateTaskParams = z.output<typeof updateTaskSchema>;
export type ListTasksInput = z.input<typeof listTasksQuerySchema>;
export type ListTasksQuery = z.output<typeof listTasksQuerySchema>;
export type SortField = z.infer<typeof sortFieldSchema>;

/**
 * Parse input against a schema, converting zod issues into a ValidationError
 */
export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown, context: string): z.output<T> {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message
        }));
        const summary = issues
            .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
            .join('; ');
        throw new ValidationError(`Invalid ${context}: ${summary}`, issues);
    }
    return result.data;
}
