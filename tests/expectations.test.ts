import { describe, expect, it } from "vitest";
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
} from "../src/expectation.ts";
import { ExpectationMismatchError, Expectations } from "../src/expectations.ts";
import { HttpRequest, parseRequest } from "../src/http/request.ts";

describe("Expectations: matching sets", () => {
	const cases: [string, Expectation[], HttpRequest][] = [
		["empty", [], new HttpRequest()],
		["method", [new Method("GET")], new HttpRequest()],
		[
			"method and path",
			[new Method("POST"), new Path("/some/path")],
			parseRequest("/some/path").withMethod("POST"),
		],
		["query eq", [new QueryEq("key-eq", "val-eq")], parseRequest("/?key-eq=val-eq")],
		["query exists", [new QueryExists("key-exists")], parseRequest("/?key-exists")],
		["query miss", [new QueryMiss("miss-key")], parseRequest("/?key-exists=some-val")],
		[
			"query with method and path",
			[
				new Method("PUT"),
				new Path("/path/with/query"),
				new QueryEq("key-eq", "val-eq"),
				new QueryExists("key-exists"),
				new QueryMiss("miss-key"),
			],
			parseRequest("/path/with/query?key-eq=val-eq&key-exists=some-val").withMethod("PUT"),
		],
		[
			"header eq",
			[new HeaderEq("key-eq", "val-eq")],
			new HttpRequest().withHeader("key-eq", "val-eq"),
		],
		[
			"header exists",
			[new HeaderExists("key-exists")],
			new HttpRequest().withHeader("key-exists", "some-value"),
		],
		["header miss", [new HeaderMiss("miss-key")], new HttpRequest()],
		[
			"header with method and path",
			[
				new Method("GET"),
				new Path("/path/with/header"),
				new HeaderEq("key-eq", "val-eq"),
				new HeaderExists("key-exists"),
				new HeaderMiss("miss-key"),
			],
			parseRequest("/path/with/header")
				.withHeader("key-eq", "val-eq")
				.withHeader("key-exists", "some-value"),
		],
		["path and fragment miss", [new Path("/path"), new FragmentMiss()], parseRequest("/path")],
		[
			"path and fragment eq",
			[new Path("/path"), new FragmentEq("anchor")],
			parseRequest("/path#anchor"),
		],
		["path and body miss", [new Path("/without/body"), new BodyMiss()], parseRequest("/without/body")],
		["body eq", [new BodyEq("some body")], new HttpRequest().withBody("some body")],
	];

	for (const [name, rules, request] of cases) {
		it(name, () => {
			const expectations = new Expectations(rules);
			expect(expectations.isMatched(request)).toBe(true);
			expect(expectations.validate(request)).toBeNull();
		});
	}
});

describe("Expectations: failing sets", () => {
	const cases: [string, Expectation[], Expectation[], HttpRequest][] = [
		["method", [new Path("/path"), new Method("POST")], [new Method("GET")], parseRequest("/path")],
		["path", [new Method("GET"), new Path("/wrong")], [new Path("/correct")], parseRequest("/correct")],
		[
			"query eq",
			[new QueryEq("key", "wrong")],
			[new QueryEq("key", "correct")],
			parseRequest("/?key=correct"),
		],
		[
			"query exists",
			[new QueryExists("missing")],
			[new QueryMiss("missing")],
			parseRequest("/?other=value"),
		],
		[
			"query miss",
			[new QueryMiss("present")],
			[new QueryExists("present")],
			parseRequest("/?present=value"),
		],
		[
			"header eq",
			[new HeaderEq("Content-Type", "wrong")],
			[new HeaderEq("Content-Type", "correct")],
			new HttpRequest().withHeader("Content-Type", "correct"),
		],
		["header exists", [new HeaderExists("missing")], [new HeaderMiss("missing")], new HttpRequest()],
		[
			"header miss",
			[new HeaderMiss("present")],
			[new HeaderExists("present")],
			new HttpRequest().withHeader("present", "value"),
		],
		[
			"fragment eq",
			[new FragmentEq("wrong")],
			[new FragmentEq("correct")],
			parseRequest("/path#correct"),
		],
		[
			"fragment miss",
			[new FragmentMiss()],
			[new FragmentEq("present")],
			parseRequest("/path#present"),
		],
		[
			"body eq",
			[new BodyEq("wrong body")],
			[new BodyEq("correct body")],
			new HttpRequest().withBody("correct body"),
		],
		[
			"body miss",
			[new BodyMiss()],
			[new BodyEq("present")],
			new HttpRequest().withBody("present"),
		],
		[
			"multiple",
			[new Method("POST"), new Path("/wrong"), new QueryEq("key", "bad")],
			[new Method("GET"), new Path("/correct"), new QueryEq("key", "good")],
			parseRequest("/correct?key=good").withMethod("GET"),
		],
		[
			"mixed, one failure",
			[new Method("GET"), new Path("/correct"), new QueryEq("key", "wrong")],
			[new QueryEq("key", "right")],
			parseRequest("/correct?key=right").withMethod("GET"),
		],
		[
			"mixed, all fail against default",
			[new Method("POST"), new Path("/api"), new QueryExists("token")],
			[new Method("GET"), new Path("/"), new QueryMiss("token")],
			new HttpRequest(),
		],
		[
			"method and path in rule order",
			[new Method("GET"), new Path("/correct")],
			[new Method("POST"), new Path("/wrong")],
			new HttpRequest({ method: "POST", path: "/wrong" }),
		],
	];

	for (const [name, rules, reports, request] of cases) {
		it(name, () => {
			const expectations = new Expectations(rules);
			expect(expectations.isMatched(request)).toBe(false);
			expect(expectations.validate(request)).toStrictEqual(reports);
		});
	}

	it("reversing the rules reverses the diagnostics", () => {
		const request = new HttpRequest({ method: "POST", path: "/wrong" });
		const expectations = new Expectations([new Path("/correct"), new Method("GET")]);
		expect(expectations.validate(request)).toStrictEqual([new Path("/wrong"), new Method("POST")]);
	});
});

describe("Expectations: construction", () => {
	it("add appends in place", () => {
		const expectations = new Expectations();
		expectations.add(new Method("POST"));
		expectations.add(new Path("/api"));

		expect(expectations.size).toBe(2);
		expect(expectations.validate(new HttpRequest())).toStrictEqual([
			new Method("GET"),
			new Path("/"),
		]);
	});

	it("keeps duplicate rules", () => {
		const expectations = new Expectations([new Method("POST"), new Method("POST")]);
		expect(expectations.validate(new HttpRequest())).toStrictEqual([
			new Method("GET"),
			new Method("GET"),
		]);
	});

	it("copies the input list", () => {
		const rules: Expectation[] = [new Method("GET")];
		const expectations = new Expectations(rules);
		rules.push(new Path("/other"));
		expect(expectations.size).toBe(1);
	});

	it("validation does not mutate the request", () => {
		const request = parseRequest("/p?a=1#f").withHeader("h", "v").withBody("b");
		const snapshot = request.toString();
		new Expectations([new QueryMiss("a"), new HeaderEq("h", "w"), new BodyMiss()]).validate(request);
		expect(request.toString()).toBe(snapshot);
	});
});

describe("Expectations: consistency", () => {
	const sets = [
		new Expectations(),
		new Expectations([new Method("get"), new Path("/x")]),
		new Expectations([new QueryEq("a", "1"), new HeaderExists("h"), new FragmentMiss()]),
		new Expectations([new BodyEq("b"), new QueryMiss("flag")]),
	];
	const requests = [
		new HttpRequest(),
		parseRequest("/x?a=1&flag").withHeader("h", "v").withBody("b"),
		parseRequest("/x?a=2#f"),
	];

	it("isMatched agrees with validate", () => {
		for (const set of sets) {
			for (const request of requests) {
				expect(set.isMatched(request)).toBe(set.validate(request) === null);
			}
		}
	});

	it("corrected sets always match", () => {
		for (const set of sets) {
			for (const request of requests) {
				expect(set.corrected(request).isMatched(request)).toBe(true);
			}
		}
	});
});

describe("Expectations.corrected", () => {
	it("replaces failing rules in place and keeps passing ones", () => {
		const expectations = new Expectations([
			new Method("POST"),
			new Path("/api"),
			new QueryExists("token"),
			new HeaderMiss("x"),
		]);
		const corrected = expectations.corrected(new HttpRequest());
		expect(corrected.expectations).toStrictEqual([
			new Method("GET"),
			new Path("/"),
			new QueryMiss("token"),
			new HeaderMiss("x"),
		]);
		expect(expectations.size).toBe(4);
	});
});

describe("Expectations: mismatch reporting", () => {
	const expectations = new Expectations([
		new Method("GET"),
		new Path("/correct"),
		new HeaderMiss("x"),
	]);
	const request = new HttpRequest({ method: "POST", path: "/wrong" });
	const report = [
		"request [POST /wrong] failed 2 of 3 expectations:",
		'  expected Method("GET"), got Method("POST")',
		'  expected Path("/correct"), got Path("/wrong")',
	].join("\n");

	it("describeMismatch lists each failing rule", () => {
		expect(expectations.describeMismatch(request)).toBe(report);
	});

	it("describeMismatch is null on a match", () => {
		expect(expectations.describeMismatch(parseRequest("/correct"))).toBeNull();
	});

	it("failures pair each rule with its diagnostic", () => {
		expect(expectations.failures(request)).toStrictEqual([
			{ expected: new Method("GET"), actual: new Method("POST") },
			{ expected: new Path("/correct"), actual: new Path("/wrong") },
		]);
	});

	it("assertMatched passes on a match", () => {
		expect(() => expectations.assertMatched(parseRequest("/correct"))).not.toThrow();
	});

	it("assertMatched throws with diagnostics", () => {
		let caught: unknown;
		try {
			expectations.assertMatched(request);
		} catch (e) {
			caught = e;
		}

		expect(caught).toBeInstanceOf(ExpectationMismatchError);
		if (caught instanceof ExpectationMismatchError) {
			expect(caught.name).toBe("ExpectationMismatchError");
			expect(caught.message).toBe(report);
			expect(caught.request).toBe(request);
			expect(caught.diagnostics).toStrictEqual([new Method("POST"), new Path("/wrong")]);
		}
	});
});
