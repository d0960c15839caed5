export {
  Caller,
  CallRequest,
  assertPath,
  invokeOrPurge,
  normalizeMethod,
  type CallerOptions,
  type RequestOptions,
} from "./caller.js";
export {
  AxiosTransport,
  HTTP_METHODS,
  flattenHeaders,
  type AxiosTransportOptions,
  type HttpMethod,
  type JsonValue,
  type OutgoingRequest,
  type Transport,
  type TransportResponse,
} from "./transport.js";
export { quoteShellArgument, toCommandLine } from "./curl.js";
export { composeUrl } from "./url.js";
