export {
  createHttpClient,
  isReachableStatus,
  type HttpClient,
  type LivenessResponse,
  type StreamResponse,
} from './http';
