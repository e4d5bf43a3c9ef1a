import { z } from 'zod';
import { EMAIL_PRIORITIES } from '../../types';
import { ValidationError } from '../../domain/common/Errors';

const emailId = z.string().min(1);
const folderName = z.string().min(1);
const recipient = z.string().min(1);

export const listEmailsArgs = z.object({
  folder: folderName.default('inbox'),
  limit: z.number().int().min(1).max(100).default(20),
  offset: z.number().int().min(0).default(0),
});

export const emailIdArgs = z.object({
  email_id: emailId,
});

export const searchEmailsArgs = z.object({
  query: z.string().min(1),
  folder: folderName.nullish(),
});

export const moveEmailArgs = z.object({
  email_id: emailId,
  target_folder: folderName,
});

export const sendEmailArgs = z.object({
  to: z.array(recipient).min(1),
  subject: z.string(),
  body: z.string(),
  cc: z.array(recipient).nullish().transform(cc => cc ?? []),
  priority: z.enum(EMAIL_PRIORITIES).default('normal'),
});

export const noArgs = z.object({});

export function generateArgs(defaultCount: number, maxCount: number) {
  return z.object({
    count: z.number().int().min(1).max(maxCount).default(Math.min(defaultCount, maxCount)),
  });
}

/**
 * Validate loosely typed tool arguments.
 * Missing arguments are treated as an empty object.
 * @throws {ValidationError} listing each failing path
 */
export function parseToolArgs<S extends z.ZodTypeAny>(tool: string, schema: S, args: unknown): z.output<S> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    throw new ValidationError(`Invalid arguments for ${tool}`, result.error.issues.map(i => ({
      path: i.path.join('.'),
      message: i.message,
    })));
  }
  return result.data;
}
