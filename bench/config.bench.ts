/**
 * Config benchmarks: plain-object parsing, YAML parsing, serialization.
 *
 * Run: npm run bench:config
 */

import { bench, run, summary } from "mitata";

import {
	type ExpectationConfig,
	expectationsToConfig,
	parseExpectationsConfig,
	parseExpectationsYaml,
} from "../src/index.ts";

const entries: ExpectationConfig[] = [
	{ type: "method", value: "POST" },
	{ type: "path", value: "/api/v1/users" },
	{ type: "query_eq", key: "page", value: "2" },
	{ type: "header_exists", key: "authorization" },
	{ type: "fragment_miss" },
	{ type: "body_eq", value: '{"name":"test"}' },
];

const yaml = [
	"expectations:",
	"  - { type: method, value: POST }",
	"  - { type: path, value: /api/v1/users }",
	'  - { type: query_eq, key: page, value: "2" }',
	"  - { type: header_exists, key: authorization }",
	"  - { type: fragment_miss }",
].join("\n");

summary(() => {
	bench("parse_config_object", () => parseExpectationsConfig({ expectations: entries }));
	bench("parse_config_yaml", () => parseExpectationsYaml(yaml));
});

summary(() => {
	const expectations = parseExpectationsConfig({ expectations: entries });
	bench("to_config", () => expectationsToConfig(expectations));
});

await run();
