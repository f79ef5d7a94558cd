export { loadStreamingConfig, parseStreamingConfig } from './load-config.js';
