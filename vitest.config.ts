import { defineConfig } from 'vitest/config'
import { resolve } from 'path'
import { fileURLToPath } from 'url'

const root = fileURLToPath(new URL('.', import.meta.url))

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['packages/__tests__/**/*.test.ts'],
    // One fork, tests run serially.
    pool: 'forks',
    poolOptions: {
      forks: { singleFork: true },
    },
  },
  resolve: {
    // Source aliases so tests run against TypeScript source without a prior build.
    alias: [
      {
        find: /^@relaychat\/core$/,
        replacement: resolve(root, 'packages/chat-core/src/index.ts'),
      },
      {
        find: /^@relaychat\/auth$/,
        replacement: resolve(root, 'packages/chat-auth/src/index.ts'),
      },
      {
        find: /^@relaychat\/server$/,
        replacement: resolve(root, 'packages/chat-server/src/index.ts'),
      },
      {
        find: /^@relaychat\/client$/,
        replacement: resolve(root, 'packages/chat-client/src/index.ts'),
      },
    ],
  },
})
