export {
  InferenceRouter,
  type InferenceBackend,
  type InferenceClient,
  type InferenceRequest,
  type InferenceResponse
} from './router.js';
export { extractJsonObject } from './json-reply.js';
