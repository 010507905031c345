import { EnvConfigProvider, type ConfigProvider } from '@fieldmap/config';
import { Logger, buildLoggerOptions, readLogConfig, type LogConfig } from '@fieldmap/logging';

/**
 * Apply LOG_* settings from `provider` to every Logger, including the ones
 * mappings create by default.
 *
 * @example
 * ```typescript
 * await configureLogging(); // reads process.env
 * ```
 */
export async function configureLogging(provider: ConfigProvider = new EnvConfigProvider()): Promise<LogConfig> {
	const config = await readLogConfig(provider);
	Logger.configure(buildLoggerOptions(config));
	return config;
}
