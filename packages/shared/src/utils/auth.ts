/**
 * Authentication and authorization utilities
 */

/**
 * Normalize an email address for storage and lookup
 * - Trims whitespace
 * - Lower-cases the domain part, keeps the local part as typed
 * @param email - Email address to normalize
 * @returns Normalized email address, or null when empty
 */
export function normalizeEmail(email: string | undefined | null): string | null {
  if (!email) {
    return null
  }
  const trimmed = email.trim()
  if (!trimmed) {
    return null
  }

  const at = trimmed.lastIndexOf('@')
  if (at === -1) {
    return trimmed
  }
  return trimmed.slice(0, at) + '@' + trimmed.slice(at + 1).toLowerCase()
}

/**
 * Validate that a string is a valid PostgreSQL parameter placeholder
 * @param param - The parameter string to validate (e.g., '$1', '$2')
 * @throws Error if the parameter is not a valid placeholder
 */
function assertPgPlaceholder(param: string): void {
  if (!/^\$\d+$/.test(param)) {
    throw new Error(`Invalid SQL parameter placeholder: ${param}. Expected format: $1, $2, etc.`)
  }
}

/**
 * SQL fragment restricting a projects query to those the user is a contributor of
 *
 * @param userIdParam - The SQL parameter placeholder for the user id (e.g., '$1')
 * @param projectAlias - The alias used for the projects table (default: 'p')
 * @param memberAlias - The alias to use for the contributors table (default: 'c')
 * @returns SQL JOIN fragment
 *
 * @example
 * const query = `
 *   SELECT p.* FROM projects p
 *   ${getMembershipJoin('$1')}
 *   ORDER BY p.id DESC
 * `;
 */
export function getMembershipJoin(
  userIdParam: string,
  projectAlias = 'p',
  memberAlias = 'c'
): string {
  assertPgPlaceholder(userIdParam)
  return `INNER JOIN contributors ${memberAlias} ON ${projectAlias}.id = ${memberAlias}.project_id AND ${memberAlias}.user_id = ${userIdParam}`
}
