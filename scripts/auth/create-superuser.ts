#!/usr/bin/env tsx
import { config, getErrorMessage, isBaseError } from '@issuetrack/shared'
import { container } from '../../services/api/src/container'
import { UserService } from '../../services/api/src/services/UserService'

/**
 * Create a staff/superuser account.
 * Usage: npm run auth:create-superuser -- <email> <password>
 */
async function createSuperuser() {
  const [email, password] = process.argv.slice(2)

  if (!email || !password) {
    console.error('Usage: npm run auth:create-superuser -- <email> <password>')
    console.error('Example: npm run auth:create-superuser -- admin@example.com change-me-please')
    process.exit(1)
  }

  if (!config.database.url) {
    console.error('DATABASE_URL environment variable is required')
    process.exit(1)
  }

  try {
    const users = new UserService(container.getRepositories().users, config.auth.bcryptRounds)
    const user = await users.createSuperuser(email, password)
    console.log(`Superuser created: ${user.email} (id ${user.id})`)
  } catch (error) {
    if (isBaseError(error)) {
      console.error(`Could not create superuser: ${error.message}`)
    } else {
      console.error('Failed to create superuser:', getErrorMessage(error))
    }
    process.exitCode = 1
  } finally {
    await container.cleanup()
  }
}

createSuperuser().catch(console.error)
