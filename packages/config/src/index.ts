export type { ConfigProvider } from './types';
export { EnvConfigProvider } from './env-config';
