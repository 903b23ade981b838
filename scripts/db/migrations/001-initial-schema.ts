#!/usr/bin/env tsx
import { Pool } from 'pg'

/**
 * Migration: initial schema
 * Creates users, projects, contributors, issues and comments with their
 * constraints and lookup indexes. Safe to re-run.
 */
async function createInitialSchema() {
  const databaseUrl = process.env.DATABASE_URL
  if (!databaseUrl) {
    console.error('DATABASE_URL environment variable is required')
    process.exit(1)
  }

  const pool = new Pool({ connectionString: databaseUrl })

  try {
    console.log('Starting initial schema migration...')

    await pool.query('BEGIN')

    console.log('Creating users table...')
    await pool.query(`
      CREATE TABLE IF NOT EXISTS users (
        id SERIAL PRIMARY KEY,
        email VARCHAR(255) NOT NULL UNIQUE,
        password_hash VARCHAR(255) NOT NULL,
        first_name VARCHAR(150) NOT NULL DEFAULT '',
        last_name VARCHAR(150) NOT NULL DEFAULT '',
        is_active BOOLEAN NOT NULL DEFAULT TRUE,
        is_staff BOOLEAN NOT NULL DEFAULT FALSE,
        is_superuser BOOLEAN NOT NULL DEFAULT FALSE,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `)

    console.log('Creating projects table...')
    await pool.query(`
      CREATE TABLE IF NOT EXISTS projects (
        id SERIAL PRIMARY KEY,
        title VARCHAR(255) NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        type VARCHAR(255) NOT NULL,
        author_user_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `)

    console.log('Creating contributors table...')
    await pool.query(`
      CREATE TABLE IF NOT EXISTS contributors (
        id SERIAL PRIMARY KEY,
        project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
        user_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
        permission VARCHAR(20) NOT NULL CHECK (permission IN ('OWNER', 'CONTRIBUTOR')),
        role VARCHAR(255) NOT NULL DEFAULT '',
        UNIQUE (project_id, user_id)
      )
    `)

    console.log('Creating issues table...')
    await pool.query(`
      CREATE TABLE IF NOT EXISTS issues (
        id SERIAL PRIMARY KEY,
        project_id INTEGER NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
        title VARCHAR(255) NOT NULL,
        description TEXT NOT NULL DEFAULT '',
        tag VARCHAR(255) NOT NULL,
        priority VARCHAR(255) NOT NULL,
        status VARCHAR(255) NOT NULL,
        author_user_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
        assignee_user_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
        created_time TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `)

    console.log('Creating comments table...')
    await pool.query(`
      CREATE TABLE IF NOT EXISTS comments (
        id SERIAL PRIMARY KEY,
        issue_id INTEGER NOT NULL REFERENCES issues(id) ON DELETE CASCADE,
        author_user_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
        description TEXT NOT NULL,
        created_time TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `)

    console.log('Creating indexes...')
    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_contributors_user_id ON contributors(user_id);
      CREATE INDEX IF NOT EXISTS idx_issues_project_id ON issues(project_id);
      CREATE INDEX IF NOT EXISTS idx_comments_issue_id ON comments(issue_id);
    `)

    await pool.query('COMMIT')
    console.log('\nInitial schema migration completed successfully!')
  } catch (error) {
    await pool.query('ROLLBACK')
    console.error('Migration failed:', error instanceof Error ? error.message : String(error))
    process.exit(1)
  } finally {
    await pool.end()
  }
}

createInitialSchema().catch(console.error)
