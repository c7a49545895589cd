// Request model: also importable from "reqexpect/http"
export { HttpRequest, parseRequest } from "./http/request.ts";
export type { HttpRequestInit, QueryValue } from "./http/request.ts";

// Expectation variants
export {
	BodyEq,
	BodyMiss,
	FragmentEq,
	FragmentMiss,
	HeaderEq,
	HeaderExists,
	HeaderMiss,
	Method,
	Path,
	QueryEq,
	QueryExists,
	QueryMiss,
	expectationEquals,
} from "./expectation.ts";
export type { Expectation, ExpectationKind } from "./expectation.ts";

// Aggregator
export { ExpectationMismatchError, Expectations } from "./expectations.ts";
export type { Failure } from "./expectations.ts";

// Config
export {
	ConfigParseError,
	expectationsToConfig,
	parseExpectationConfig,
	parseExpectationsConfig,
	parseExpectationsYaml,
} from "./config.ts";
export type { ExpectationConfig, ExpectationsConfig } from "./config.ts";

// Logging
export { LogLevel, Logger, createLogger } from "./logger.ts";
export type { LoggerOptions } from "./logger.ts";
