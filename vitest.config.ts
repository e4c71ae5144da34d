import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		globals: true,
		environment: 'node',
		include: ['tests/**/*.{test,spec}.ts', 'src/**/*.{test,spec}.ts'],
		setupFiles: ['./tests/setup.ts'],
		// Read by the logger when it is first imported
		env: {
			LOG_FILES: 'off',
			LOG_SILENT: 'true'
		},
		coverage: {
			provider: 'v8',
			reporter: ['text', 'lcov', 'html'],
			include: ['src/**/*.ts'],
			exclude: [
				'src/**/*.d.ts',
				'src/**/*.test.ts',
				'src/**/*.spec.ts',
				'src/bot.ts'
			],
			thresholds: {
				branches: 60,
				functions: 60,
				lines: 60,
				statements: 60
			}
		},
		// Every suite opens its own in-memory database, but the logger is a
		// process-wide singleton
		pool: 'forks',
		poolOptions: {
			forks: {
				singleFork: true
			}
		}
	}
});
