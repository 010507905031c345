/**
 * Configuration provider interface.
 *
 * Settings are read through a provider so the source can be swapped:
 * - Local development and tests: EnvConfigProvider (reads process.env)
 * - Hosted deployments: any provider backed by a secrets store
 *
 * @example
 * ```ts
 * const provider = new EnvConfigProvider();
 * await configureLogging(provider);
 * ```
 */
export interface ConfigProvider {
	/**
	 * Gets a configuration value by key.
	 * @returns The value, or undefined if not found
	 */
	get(key: string): Promise<string | undefined>;
}
