/**
 * @ipscout/http - HTTP strategy
 *
 * @packageDocumentation
 */

export { HttpDetails, isHttpDetails, type ExtractMethod } from './details.js';
export { extractCandidate } from './extract.js';
export {
  createHttpClient,
  HttpError,
  DEFAULT_USER_AGENT,
  type HttpClient,
  type HttpClientOptions,
  type HttpGetRequest,
  type HttpResponse,
  type LookupResult,
} from './client.js';
export { HttpResolver, parseHttpUri, type HttpResolverOptions } from './resolver.js';
export {
  HTTP_IPIFY_ORG,
  HTTP_MY_IP_IO,
  HTTP_MYIP_COM,
  HTTP_SEEIP_ORG,
  HTTP_PROVIDERS,
  createHttpProvider,
  createHttpProviders,
} from './providers.js';
