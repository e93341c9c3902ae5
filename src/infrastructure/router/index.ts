export { default as routerPlugin } from './router-plugin.js';
