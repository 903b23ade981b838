import { z } from 'zod'
import { CONTRIBUTOR_PERMISSIONS } from '../types/contributors'
import { ValidationError, type FieldErrors } from '../types/errors'

/**
 * Validation utilities: zod schemas for every request payload and the
 * conversion of zod issues into the API's ValidationError
 */

const BLANK = 'This field may not be blank.'
const REQUIRED = 'This field is required.'

// Required, non-blank text column (VARCHAR(255))
const requiredText = (max = 255) =>
  z
    .string({ required_error: REQUIRED, invalid_type_error: 'Not a valid string.' })
    .trim()
    .min(1, BLANK)
    .max(max, `Ensure this field has no more than ${max} characters.`)

const optionalText = z
  .string({ invalid_type_error: 'Not a valid string.' })
  .optional()
  .default('')

/**
 * Upper bound of a SERIAL / INTEGER column
 */
export const MAX_ID = 2147483647

const DIGITS = /^\d+$/
const INVALID_ID = 'A valid integer is required.'

// Digit-only strings become numbers; anything else reaches the number check unchanged
const digitsToNumber = (value: unknown): unknown =>
  typeof value === 'string' && DIGITS.test(value) ? Number(value) : value

/**
 * Positive integer id in a request body: a JSON integer or a digit string
 */
export const idSchema = z.preprocess(
  digitsToNumber,
  z
    .number({ required_error: REQUIRED, invalid_type_error: INVALID_ID })
    .int(INVALID_ID)
    .positive(INVALID_ID)
    .max(MAX_ID, INVALID_ID)
)

/**
 * Id taken from a URL path segment
 */
export const pathIdSchema = z
  .string()
  .regex(DIGITS)
  .transform(Number)
  .pipe(z.number().int().min(1).max(MAX_ID))

export const emailSchema = z
  .string({ required_error: REQUIRED })
  .trim()
  .min(1, BLANK)
  .email('Enter a valid email address.')

export const signupSchema = z.object({
  email: emailSchema,
  password: z
    .string({ required_error: REQUIRED })
    .min(8, 'Ensure this field has at least 8 characters.'),
  first_name: optionalText,
  last_name: optionalText,
})

export const loginSchema = z.object({
  email: z.string({ required_error: REQUIRED }).trim().min(1, BLANK),
  password: z.string({ required_error: REQUIRED }).min(1, BLANK),
})

export const refreshSchema = z.object({
  refresh: z.string({ required_error: REQUIRED }).min(1, BLANK),
})

export const verifySchema = z.object({
  token: z.string({ required_error: REQUIRED }).min(1, BLANK),
})

export const projectSchema = z.object({
  title: requiredText(),
  description: optionalText,
  type: requiredText(),
})

export const contributorSchema = z.object({
  user_id: idSchema,
  permission: z.enum(CONTRIBUTOR_PERMISSIONS, {
    errorMap: (_issue, ctx) => ({
      message:
        ctx.data === undefined ? REQUIRED : `"${String(ctx.data)}" is not a valid choice.`,
    }),
  }),
  role: optionalText,
})

export const issueSchema = z.object({
  title: requiredText(),
  description: optionalText,
  tag: requiredText(),
  priority: requiredText(),
  status: requiredText(),
  assignee_user_id: idSchema.nullish(),
})

export const commentSchema = z.object({
  description: z.string({ required_error: REQUIRED }).trim().min(1, BLANK),
})

export const paginationSchema = z.object({
  page: z
    .preprocess(
      digitsToNumber,
      z
        .number({ invalid_type_error: 'Invalid page.' })
        .int('Invalid page.')
        .min(1, 'Invalid page.')
        .max(MAX_ID, 'Invalid page.')
    )
    .default(1),
})

/**
 * Collapse zod issues into a field -> messages map.
 * Issues not tied to a field land under `non_field_errors`.
 */
export function toFieldErrors(error: z.ZodError): FieldErrors {
  const fields: FieldErrors = {}
  for (const issue of error.issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : 'non_field_errors'
    const messages = fields[key] ?? []
    messages.push(issue.message)
    fields[key] = messages
  }
  return fields
}

/**
 * Parse `input` with `schema` or throw a ValidationError
 */
export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw new ValidationError('Invalid input.', toFieldErrors(result.error))
  }
  return result.data
}
