import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: [
        'src/monitor/state-machine.ts',
        'src/monitor/tracker.ts',
        'src/monitor/targets.ts',
        'src/report/aggregate.ts',
        'src/report/schedule.ts',
        'src/notify/template.ts',
        'src/notify/message.ts',
      ],
      thresholds: {
        lines: 90,
        functions: 90,
        statements: 90,
        branches: 85,
      },
    },
  },
});
