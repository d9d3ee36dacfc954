export { showConfig } from './showConfig.js';
