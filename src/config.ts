/**
 * Config types for data-driven expectation construction.
 *
 * Stub files (JSON or YAML, loaded by the caller) describe expectations as
 * plain objects tagged by `type`. Config-driven construction path:
 *   unknown -> parseExpectationsConfig() -> Expectations
 *   YAML text -> parseExpectationsYaml() -> parseExpectationsConfig()
 *
 * | Config type       | Runtime type   |
 * |-------------------|----------------|
 * | `method`          | Method         |
 * | `path`            | Path           |
 * | `query_eq`        | QueryEq        |
 * | `query_exists`    | QueryExists    |
 * | `query_miss`      | QueryMiss      |
 * | `header_eq`       | HeaderEq       |
 * | `header_exists`   | HeaderExists   |
 * | `header_miss`     | HeaderMiss     |
 * | `fragment_eq`     | FragmentEq     |
 * | `fragment_miss`   | FragmentMiss   |
 * | `body_eq`         | BodyEq         |
 * | `body_miss`       | BodyMiss       |
 */

import { load } from "js-yaml";

import {
	BodyEq,
	BodyMiss,
	type Expectation,
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
} from "./expectation.ts";
import { Expectations } from "./expectations.ts";
import { createLogger } from "./logger.ts";

// =====================================================================
// Config types
// =====================================================================

export type ExpectationConfig =
	| { readonly type: "method"; readonly value: string }
	| { readonly type: "path"; readonly value: string }
	| { readonly type: "query_eq"; readonly key: string; readonly value: string }
	| { readonly type: "query_exists"; readonly key: string }
	| { readonly type: "query_miss"; readonly key: string }
	| { readonly type: "header_eq"; readonly key: string; readonly value: string }
	| { readonly type: "header_exists"; readonly key: string }
	| { readonly type: "header_miss"; readonly key: string }
	| { readonly type: "fragment_eq"; readonly value: string }
	| { readonly type: "fragment_miss" }
	| { readonly type: "body_eq"; readonly value: string }
	| { readonly type: "body_miss" };

/** Top-level document shape. */
export interface ExpectationsConfig {
	readonly expectations: readonly ExpectationConfig[];
}

// =====================================================================
// Parsing (unknown -> runtime types)
// =====================================================================

const logger = createLogger("config");

/** Error parsing a config value into expectations. */
export class ConfigParseError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigParseError";
	}
}

/**
 * Parse an unknown value into an Expectations aggregator.
 *
 * Main entry point for config loading. Entry order is preserved.
 */
export function parseExpectationsConfig(data: unknown): Expectations {
	if (!isRecord(data)) {
		throw new ConfigParseError(`expected object, got ${describeType(data)}`);
	}

	const rawExpectations = data.expectations;
	if (rawExpectations === undefined) {
		throw new ConfigParseError("missing required field 'expectations'");
	}
	if (!Array.isArray(rawExpectations)) {
		throw new ConfigParseError(
			`'expectations' must be an array, got ${describeType(rawExpectations)}`,
		);
	}

	const expectations = new Expectations(
		rawExpectations.map((entry: unknown, i) => parseEntry(entry, `expectations[${i}]`)),
	);
	logger.debug("loaded expectations", { count: expectations.size });
	return expectations;
}

/**
 * Parse YAML (or JSON) source text into an Expectations aggregator.
 *
 * Syntax errors surface as ConfigParseError.
 */
export function parseExpectationsYaml(source: string): Expectations {
	let data: unknown;
	try {
		data = load(source);
	} catch (e) {
		throw new ConfigParseError(`invalid YAML: ${e instanceof Error ? e.message : String(e)}`);
	}
	return parseExpectationsConfig(data);
}

/** Parse a single expectation entry. */
export function parseExpectationConfig(data: unknown): Expectation {
	return parseEntry(data, "expectation");
}

/** Serialize expectations back to config entries, in order. */
export function expectationsToConfig(
	expectations: Expectations | readonly Expectation[],
): ExpectationConfig[] {
	const list = expectations instanceof Expectations ? expectations.expectations : expectations;
	return list.map((e) => e.toConfig());
}

function parseEntry(data: unknown, where: string): Expectation {
	if (!isRecord(data)) {
		throw new ConfigParseError(`${where}: must be an object, got ${describeType(data)}`);
	}

	const type = data.type;
	if (type === undefined) {
		throw new ConfigParseError(`${where}: missing required field 'type'`);
	}

	switch (type) {
		case "method":
			return new Method(requireString(data, "value", where));
		case "path":
			return new Path(requireString(data, "value", where));
		case "query_eq":
			return new QueryEq(requireString(data, "key", where), requireString(data, "value", where));
		case "query_exists":
			return new QueryExists(requireString(data, "key", where));
		case "query_miss":
			return new QueryMiss(requireString(data, "key", where));
		case "header_eq":
			return new HeaderEq(requireString(data, "key", where), requireString(data, "value", where));
		case "header_exists":
			return new HeaderExists(requireString(data, "key", where));
		case "header_miss":
			return new HeaderMiss(requireString(data, "key", where));
		case "fragment_eq":
			return new FragmentEq(requireString(data, "value", where));
		case "fragment_miss":
			return new FragmentMiss();
		case "body_eq":
			return new BodyEq(requireString(data, "value", where));
		case "body_miss":
			return new BodyMiss();
		default:
			throw new ConfigParseError(`${where}: unknown expectation type: "${String(type)}"`);
	}
}

function requireString(obj: Record<string, unknown>, field: string, where: string): string {
	const value = obj[field];
	if (value === undefined) {
		throw new ConfigParseError(
			`${where}: ${String(obj.type)} expectation missing required field '${field}'`,
		);
	}
	if (typeof value !== "string") {
		throw new ConfigParseError(`${where}: '${field}' must be a string, got ${describeType(value)}`);
	}
	return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeType(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "array";
	return typeof value;
}
