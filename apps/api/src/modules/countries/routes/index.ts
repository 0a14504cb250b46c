export { default as countriesRoutes } from './countries.js';
export { default as statusRoutes } from './status.js';
