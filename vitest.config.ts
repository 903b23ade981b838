import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'services/*/src/**/*.test.ts', 'services/*/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      DATABASE_URL: 'postgresql://localhost:5432/issuetrack_test',
      JWT_SECRET: 'test-secret',
      LOG_LEVEL: 'error',
      BCRYPT_ROUNDS: '4',
    },
  },
})
