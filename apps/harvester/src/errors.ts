/**
 * Harvester error types.
 *
 * Only run-level problems are thrown: a malformed input stream or an invalid
 * configuration. Entity- and page-level failures (NOT_FOUND, fetch errors,
 * extraction misses) travel as result values and never reach this module.
 */

import type { ZodError } from 'zod'

export const ERROR_CODES = {
  INVALID_INPUT_SCHEMA: 'INVALID_INPUT_SCHEMA',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export interface ErrorIssue {
  path: string
  message: string
}

export class HarvestError extends Error {
  readonly code: ErrorCode
  readonly issues: ErrorIssue[]

  constructor(code: ErrorCode, message: string, issues: ErrorIssue[] = []) {
    super(message)
    this.name = 'HarvestError'
    this.code = code
    this.issues = issues
  }
}

/**
 * Input records do not match the required shape. Fatal for the run and
 * raised before any crawling starts.
 */
export class InvalidInputSchemaError extends HarvestError {
  constructor(message: string, issues: ErrorIssue[] = []) {
    super(ERROR_CODES.INVALID_INPUT_SCHEMA, message, issues)
    this.name = 'InvalidInputSchemaError'
  }
}

export class ConfigurationError extends HarvestError {
  constructor(message: string, issues: ErrorIssue[] = []) {
    super(ERROR_CODES.CONFIGURATION_ERROR, message, issues)
    this.name = 'ConfigurationError'
  }
}

export function isHarvestError(error: unknown): error is HarvestError {
  return error instanceof HarvestError
}

export function issuesFromZod(error: ZodError): ErrorIssue[] {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }))
}

export function describeIssues(issues: ErrorIssue[]): string {
  return issues.map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ')
}
