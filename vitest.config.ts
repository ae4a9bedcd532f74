import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

import { defineConfig } from 'vitest/config'

const rootDir = dirname(fileURLToPath(import.meta.url))

export default defineConfig({
	cacheDir: './.vitest',
	resolve: {
		alias: {
			'#utils': resolve(rootDir, './src/utils'),
		},
	},
	test: {
		environment: 'node',
		testTimeout: 20000,
		hookTimeout: 20000,
		// Prefer explicit imports over implicit globals for clarity
		globals: false,
		setupFiles: ['./tests/vitest/vitest-setup.ts'],
		include: ['src/**/*.{test,spec}.ts', 'tests/**/*.{test,spec}.ts'],
		exclude: ['dist/**', '**/node_modules/**', '**/*.d.ts'],
		reporters: ['default'],
		isolate: true,
		pool: 'forks',
		allowOnly: false,
		coverage: {
			provider: 'v8',
			reporter: ['text-summary', 'html'],
			reportsDirectory: './coverage',
			exclude: ['src/**/*.d.ts', '**/*.test.*', 'dist/**', 'vitest.config.*', 'tests/**'],
		},
		// Randomize order to catch hidden state coupling
		sequence: {
			shuffle: true,
		},
	},
})
