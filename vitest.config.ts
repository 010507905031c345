import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string): string => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			'@fieldmap/config': pkg('config'),
			'@fieldmap/logging': pkg('logging'),
			'@fieldmap/validation': pkg('validation'),
			'@fieldmap/mapping': pkg('mapping'),
			'@fieldmap/fields': pkg('fields'),
			fieldmap: pkg('fieldmap')
		}
	},
	test: {
		include: ['packages/*/__tests__/**/*.test.ts'],
		environment: 'node'
	}
});
