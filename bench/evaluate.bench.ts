/**
 * Evaluate benchmarks.
 *
 * Measures the hot path: per-variant validation, full-set matching,
 * failure-heavy workloads, and scaling with rule count.
 *
 * Run: npm run bench
 */

import { bench, run, summary } from "mitata";

import {
	BodyEq,
	type Expectation,
	Expectations,
	HeaderEq,
	HeaderMiss,
	HttpRequest,
	Method,
	Path,
	QueryEq,
	QueryExists,
	parseRequest,
} from "../src/index.ts";

// ── Fixtures ─────────────────────────────────────────────────────────────────

const request = parseRequest("/api/v1/users?page=2&verbose#top")
	.withMethod("POST")
	.withHeader("content-type", "application/json")
	.withBody('{"name":"test"}');

function matchingRules(): Expectation[] {
	return [
		new Method("post"),
		new Path("/api/v1/users"),
		new QueryEq("page", "2"),
		new QueryExists("verbose"),
		new HeaderEq("content-type", "application/json"),
		new HeaderMiss("x-debug"),
		new BodyEq('{"name":"test"}'),
	];
}

// ── Parsing ──────────────────────────────────────────────────────────────────

summary(() => {
	bench("parse_path_only", () => parseRequest("/api/v1/users"));
	bench("parse_query_fragment", () => parseRequest("/api/v1/users?page=2&verbose&sort=asc#top"));
});

// ── Single variants ──────────────────────────────────────────────────────────

summary(() => {
	const hit = new QueryEq("page", "2");
	const miss = new QueryEq("page", "3");

	bench("query_eq_hit", () => hit.validate(request));
	bench("query_eq_miss", () => miss.validate(request));
});

// ── Full set ─────────────────────────────────────────────────────────────────

summary(() => {
	const expectations = new Expectations(matchingRules());
	const other = new HttpRequest();

	bench("set_is_matched_hit", () => expectations.isMatched(request));
	bench("set_validate_hit", () => expectations.validate(request));
	bench("set_validate_all_fail", () => expectations.validate(other));
});

// ── Scaling: rule count ──────────────────────────────────────────────────────

function makeNRuleSet(n: number): Expectations {
	const expectations = new Expectations();
	for (let i = 0; i < n; i++) {
		expectations.add(new HeaderMiss(`x-rule-${i}`));
	}
	return expectations;
}

summary(() => {
	for (const n of [10, 50, 100, 200]) {
		const expectations = makeNRuleSet(n);
		bench(`rule_count_${n}_validate`, () => expectations.validate(request));
	}
});

await run();
