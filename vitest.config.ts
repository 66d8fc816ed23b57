import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: [
        'src/application/**',
        'src/infrastructure/kafka/delivery-queue.ts',
        'src/infrastructure/kafka/device-event-publisher.ts',
        'src/infrastructure/kafka/device-event-source.ts',
        'src/infrastructure/config.ts',
        'src/interfaces/http/**',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
