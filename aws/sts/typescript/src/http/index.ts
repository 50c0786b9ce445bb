/**
 * HTTP Module
 *
 * @module http
 */

export {
  PooledTransport,
  createDefaultTransport,
  type HttpTransport,
  type HttpRequest,
  type HttpResponse,
  type PooledTransportOptions,
} from './transport.js';
