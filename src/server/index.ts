export { buildApp, VERSION, type AppDeps } from './app.js';
export { toCorsOrigins } from './origins.js';
