import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: [
			'packages/*/src/**/__tests__/**/*.test.ts',
			'formatters/*/src/**/__tests__/**/*.test.ts',
			'backends/*/src/**/__tests__/**/*.test.ts',
			'sinks/*/src/**/__tests__/**/*.test.ts',
		],
		exclude: ['**/node_modules/**', '**/dist/**'],
		environment: 'node',
	},
});
