export { MockServer, type CleanupContext } from './server.js';
export { Endpoint, HTTP_METHODS, endpointName, type EndpointState, type HttpMethod } from './endpoint.js';
export { Scenario } from './scenario.js';
export { ResponseRecorder, type HeaderMap, type ResponseSink } from './recorder.js';
export { AtomicCounter } from './counter.js';
export { FailureCollector, type TestReporter } from './reporter.js';
export { MockServerError, type MockServerErrorCode, type MockServerErrorDetails } from './errors.js';
export { headers, jsonBody, jsonFileBody, statusCode, stringBody, type Responder } from './responders.js';
export {
  matchHeaders,
  matchJsonBody,
  matchQueryParams,
  type Matcher,
  type MockRequest,
  type ValueList
} from './matchers.js';
export { RequestLogger, type RequestLogEntry } from './logger.js';
export { loadConfig, resolveConfig, type MockServerConfig, type PartialDeep } from './config.js';
export {
  declarationFileSchema,
  loadDeclarations,
  parseDeclarations,
  registerDeclarations,
  type DeclarationFile
} from './declarations.js';
