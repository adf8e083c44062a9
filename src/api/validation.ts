import { z } from 'zod';
import { Request, Response, NextFunction } from 'express';

// --- Reusable patterns ---

// Safe ID: alphanumeric, hyphens, underscores
const safeId = z.string().regex(/^[a-zA-Z0-9_-]+$/, 'ID must be alphanumeric with hyphens/underscores only');

// User IDs come from the messaging channel (phone numbers, emails, opaque ids)
const userId = z.string().min(1).max(128).regex(/^[a-zA-Z0-9_.@+-]+$/, 'Invalid user ID');

// String with reasonable length limits
const shortString = z.string().min(1).max(500);
const longString = z.string().max(10000);

// --- Enums ---

const assignmentStatusSchema = z.enum(['pending', 'active', 'completed']);
const assignedBySchema = z.enum(['user', 'admin']);
const projectTypeSchema = z.enum(['project', 'training']);

// --- Param schemas ---

export const idParamSchema = z.object({
  id: safeId,
});

export const userIdParamSchema = z.object({
  userId,
});

export const userTaskParamSchema = z.object({
  userId,
  taskId: safeId,
});

// --- Conversation schemas ---

export const conversationMessageSchema = z.object({
  userId,
  message: z.string().max(4000).nullable().optional(),
}).strict();

export const proactiveCheckSchema = z.object({
  userId,
}).strict();

export const transcriptQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

// --- Engagement schemas ---

export const updateBuddyStatusSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('ACTIVE') }).strict(),
  z.object({ status: z.literal('BUSY') }).strict(),
  z.object({
    status: z.literal('POSTPONED'),
    // Epoch milliseconds or an ISO date/time
    nextContactAt: z.union([
      z.number().int().positive(),
      z.string().datetime({ offset: true }).transform(s => Date.parse(s)),
      z.string().date().transform(s => Date.parse(`${s}T00:00:00Z`)),
    ]).optional(),
  }).strict(),
]);

export type UpdateBuddyStatusInput = z.infer<typeof updateBuddyStatusSchema>;

// --- Learner schemas ---

export const setPreferencesSchema = z.object({
  preferences: z.array(z.string().min(1).max(100)).max(50),
}).strict();

export const assignProjectsSchema = z.object({
  projects: z.array(z.object({
    projectId: safeId,
    sequence: z.number().int().min(0),
  }).strict()).max(200),
}).strict();

export const updateAssignmentStatusSchema = z.object({
  status: assignmentStatusSchema,
}).strict();

export const addCommentSchema = z.object({
  comment: z.string().min(1).max(2000),
  commentBy: assignedBySchema.default('user'),
}).strict();

// --- Catalog schemas ---

export const createProjectSchema = z.object({
  name: shortString,
  description: longString.default(''),
  projectType: projectTypeSchema.default('project'),
}).strict();

export const createTaskSchema = z.object({
  projectId: safeId,
  title: shortString,
  description: longString.default(''),
  skillType: z.string().max(100).default(''),
  category: z.string().max(100).nullable().default(null),
  estimatedTime: z.number().positive().nullable().default(null),
}).strict();

// --- Middleware factories ---

function validationFailure(res: Response, message: string, error: z.ZodError) {
  return res.status(400).json({
    error: true,
    code: 'VALIDATION_ERROR',
    message,
    details: error.issues.map(i => ({
      path: i.path.join('.'),
      message: i.message,
    })),
  });
}

/**
 * Validate request body against a Zod schema.
 * The parsed value (defaults applied) replaces `req.body`.
 */
export function validateBody(schema: z.ZodTypeAny) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      return validationFailure(res, 'Invalid request body', result.error);
    }
    req.body = result.data;
    next();
  };
}

/**
 * Validate request params against a Zod schema.
 */
export function validateParams(schema: z.ZodTypeAny) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.params);
    if (!result.success) {
      return validationFailure(res, 'Invalid URL parameters', result.error);
    }
    next();
  };
}

/**
 * Validate request query against a Zod schema.
 */
export function validateQuery(schema: z.ZodTypeAny) {
  return (req: Request, res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      return validationFailure(res, 'Invalid query parameters', result.error);
    }
    next();
  };
}
