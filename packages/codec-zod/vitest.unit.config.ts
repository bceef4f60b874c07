import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

export default defineConfig({
	resolve: {
		alias: {
			'@protowire/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
			'@': fileURLToPath(new URL('../core/src', import.meta.url)),
		},
	},
	test: {
		name: 'codec-zod',
		root: fileURLToPath(new URL('.', import.meta.url)),
		include: ['tests/unit/**/*.test.ts'],
		testTimeout: 10_000,
	},
})
