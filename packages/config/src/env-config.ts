import type { ConfigProvider } from './types';

/**
 * Configuration provider that reads from environment variables.
 *
 * An `env` record can be injected in place of `process.env`, which keeps
 * tests from touching the real process environment.
 *
 * @example
 * ```ts
 * const config = new EnvConfigProvider();
 * const level = await config.get('LOG_LEVEL');
 * ```
 */
export class EnvConfigProvider implements ConfigProvider {
	public constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

	/**
	 * Gets an environment variable value.
	 * @param key - The environment variable name
	 * @returns The value, or undefined if not set
	 */
	async get(key: string): Promise<string | undefined> {
		return this.env[key];
	}
}
