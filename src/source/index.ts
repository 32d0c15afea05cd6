export {
  PayloadParseError,
  PermanentSourceError,
  TransientSourceError,
  isRetryableSourceError,
  isTransientStatus,
  type SourceErrorDetails,
} from "./errors.js";
export { AxiosTransport, type AxiosTransportOptions, type HttpTransport, type QueryParams } from "./http.js";
export {
  CallGate,
  Pacer,
  RetryExecutor,
  RetryExhaustedError,
  realSleep,
  type PacerOptions,
  type RetryAttempt,
  type RetryExecutorOptions,
  type Sleep,
} from "./retry.js";
export {
  EutilsClient,
  projectUrl,
  recordUrl,
  sampleUrl,
  type EutilsClientOptions,
} from "./eutils-client.js";
export type {
  EnrichmentSource,
  LinkSource,
  LinkTarget,
  SearchPage,
  SearchWindow,
  SourceClient,
} from "./types.js";
