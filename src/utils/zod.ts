import type { z } from 'zod'

/**
 * First issue of a failed parse, flattened for error messages.
 */
export interface IssueSummary {
  /**
   * Top-level field the issue points at, or the first unrecognized key.
   */
  field: string | undefined

  /**
   * Dotted path of the issue, empty for root-level issues.
   */
  path: string

  message: string
}

/**
 * Summarizes the first issue of a Zod error.
 *
 * @param error - The error from a failed `safeParse`
 */
export function summarizeZodError(error: z.ZodError): IssueSummary {
  const issue = error.issues[0]
  if (!issue) {
    return { field: undefined, path: '', message: 'invalid value' }
  }

  if (issue.code === 'unrecognized_keys') {
    return { field: issue.keys[0], path: issue.keys.join(', '), message: issue.message }
  }

  const path = issue.path.map(String).join('.')
  return {
    field: issue.path.length > 0 ? String(issue.path[0]) : undefined,
    path,
    message: issue.message,
  }
}
