// Vitest configuration for inboxdb.
// Tests live beside the sources as src/**/*.test.ts.

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
  },
})
