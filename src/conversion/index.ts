export { ConversionCallback } from './conversion.js';
