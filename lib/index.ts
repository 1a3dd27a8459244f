export * from "./solaredge";
export * from "./measurement";
export { estimateNextUpdate, pollDelay } from "./scheduling/next-update";
export type { NextUpdateEstimate, NextUpdateOptions } from "./scheduling/next-update";
export {
  SolarEdgeError,
  TransportError,
  ApiError,
  ParseError,
  RequestValidationError,
} from "./errors";
export type { SolarEdgeErrorKind } from "./errors";
export { createConsoleLogger, redactApiKey } from "./logger";
export type { Logger, ConsoleLoggerOptions } from "./logger";
