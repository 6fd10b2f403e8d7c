export { getDefaultSourcesConfig, ENV_PREFIX } from './defaults';
export { loadSourcesConfig, readEnvConfig } from './loader';
