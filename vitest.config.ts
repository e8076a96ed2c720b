import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    exclude: ['**/node_modules/**', '**/dist/**', '**/build/**'],
    silent: true,
    testTimeout: 90000,
    projects: [
      'source/packages/@iam-baseline/utils',
      'source/packages/@iam-baseline/config',
      'source/packages/@iam-baseline/remediation',
    ],
  },
});
