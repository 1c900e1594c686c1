import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'lib/**/*.test.ts'],
    // synthesizing the stack walks a fair amount of aws-cdk-lib
    testTimeout: 30_000
  }
})
