import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const rootDir = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    pool: 'forks',
    poolOptions: {
      forks: {
        execArgv: ['--import', 'tsx'],
      },
    },
    globalSetup: './test/setup/global-setup.ts',
    testTimeout: 10000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: [
      // Map .js imports to .ts files for path aliases
      {
        find: /^@root\/(.*)\.js$/,
        replacement: path.resolve(rootDir, './src/$1.ts'),
      },
      {
        find: /^@services\/(.*)\.js$/,
        replacement: path.resolve(rootDir, './src/services/$1.ts'),
      },
      {
        find: /^@utils\/(.*)\.js$/,
        replacement: path.resolve(rootDir, './src/utils/$1.ts'),
      },
      {
        find: /^@schemas\/(.*)\.js$/,
        replacement: path.resolve(rootDir, './src/schemas/$1.ts'),
      },
      { find: '@root', replacement: path.resolve(rootDir, './src') },
      {
        find: '@services',
        replacement: path.resolve(rootDir, './src/services'),
      },
      { find: '@utils', replacement: path.resolve(rootDir, './src/utils') },
      {
        find: '@schemas',
        replacement: path.resolve(rootDir, './src/schemas'),
      },
    ],
    extensions: ['.ts', '.js', '.json'],
  },
})
