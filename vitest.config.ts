import { defineConfig, configDefaults } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/__tests__/**/*.spec.ts'],
    exclude: [...configDefaults.exclude, '**/dist/**']
  }
})
