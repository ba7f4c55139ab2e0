import { BaseError, type ErrorContext } from "@bucket-index/errors"

type SchemaIssue = {
  path: PropertyKey[]
  message: string
}

type SchemaError = {
  issues: SchemaIssue[]
}

export type ValidationIssue = { path: string; message: string }
export type ValidationErrorContext = ErrorContext & {
  issues: ValidationIssue[]
}

function isRecord(v: unknown): v is Record<PropertyKey, unknown> {
  return typeof v === "object" && v !== null
}

function isSchemaIssue(v: unknown): v is SchemaIssue {
  return isRecord(v) && Array.isArray(v.path) && typeof v.message === "string"
}

/** Matches zod's error shape without depending on zod. */
function isSchemaError(err: unknown): err is SchemaError {
  return isRecord(err) && Array.isArray(err.issues) && err.issues.every(isSchemaIssue)
}

function formatPath(path: PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

export class ValidationError extends BaseError<"validation_error"> {
  readonly issues: ValidationIssue[]

  constructor(issues: ValidationIssue[]) {
    super(issues[0]?.message ?? "Invalid input", {
      code: "validation_error",
      context: { issues },
    })
    this.issues = issues
  }

  static fromSchemaError(err: SchemaError): ValidationError {
    return new ValidationError(
      err.issues.map((i) => ({ path: formatPath(i.path), message: i.message })),
    )
  }
}

/** Parses with `schema`, turning a schema failure into a {@link ValidationError}. */
export function parseOrThrow<T>(schema: { parse: (data: unknown) => T }, data: unknown): T {
  try {
    return schema.parse(data)
  } catch (err) {
    if (isSchemaError(err)) throw ValidationError.fromSchemaError(err)
    throw err
  }
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError
}
