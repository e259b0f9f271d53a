export {
  HttpClient,
  type HttpClientConfig,
  type HttpRequest,
  type HttpResponse,
} from './http.js';
export {
  NoaaDeclinationClient,
  buildQuery,
  type DeclinationClient,
  type NoaaClientConfig,
} from './declination-client.js';
