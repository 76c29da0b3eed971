import type { Request } from 'express';
import type { z } from 'zod';
import { logger } from './logger.js';
import { BadRequestError } from './errors.js';

export interface ValidationIssue {
  path: string;
  message: string;
}

export function summarize_issues(issues: z.ZodIssue[]): ValidationIssue[] {
  return issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
}

/**
 * Parses `input` with `schema`, logging and throwing a BadRequestError whose
 * message names the first offending field.
 */
export function parse_input<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  req: Request,
  route: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues = summarize_issues(result.error.issues);
  logger.warn(`${route} validation failed`, {
    request_id: req.request_id,
    error_count: issues.length,
    issues,
  });

  const [first] = issues;
  const message = first && first.path ? `${first.path}: ${first.message}` : first?.message ?? 'Invalid request';
  throw new BadRequestError(message, issues);
}
