import { defineConfig } from 'vitest/config';

export default defineConfig({
   test: {
      globals: true,
      environment: 'node',
      include: [
         'packages/*/src/**/*.test.ts',
      ],
      testTimeout: 20000,
      coverage: {
         provider: 'v8',
         reporter: [ 'text', 'json', 'html' ],
         include: [ 'packages/*/src/**/*.ts' ],
         exclude: [ '**/*.test.ts', '**/*.d.ts', '**/__tests__/fixtures/**' ],
      },
   },
});
