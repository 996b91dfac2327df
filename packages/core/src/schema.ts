import type { ZodError } from 'zod';

export function formatZodError(error: ZodError): string {
  const issues = error.issues ?? [];
  if (!issues.length) return error.message;
  return issues
    .map((issue) => {
      const path = issue.path?.length ? issue.path.map(String).join('.') : '';
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
