import type { Expectation } from "./expectation.ts";
import type { HttpRequest } from "./http/request.ts";
import { createLogger } from "./logger.ts";

const logger = createLogger("expectations");

/** One failed rule paired with what the request actually carried. */
export interface Failure {
	readonly expected: Expectation;
	readonly actual: Expectation;
}

/** Thrown by `Expectations.assertMatched` when at least one rule fails. */
export class ExpectationMismatchError extends Error {
	constructor(
		message: string,
		readonly request: HttpRequest,
		readonly diagnostics: readonly Expectation[],
	) {
		super(message);
		this.name = "ExpectationMismatchError";
	}
}

/**
 * Ordered set of expectations evaluated together.
 *
 * Every rule is checked, even after the first failure, and diagnostics come
 * back in the order the rules were added. `add()` appends in place and is
 * meant to run before matching starts.
 */
export class Expectations {
	private readonly items: Expectation[];

	constructor(expectations: Iterable<Expectation> = []) {
		this.items = [...expectations];
	}

	get expectations(): readonly Expectation[] {
		return this.items;
	}

	get size(): number {
		return this.items.length;
	}

	add(expectation: Expectation): void {
		this.items.push(expectation);
	}

	isMatched(request: HttpRequest): boolean {
		return this.items.every((e) => e.validate(request) === null);
	}

	/** Diagnostics for every failing rule, or null when all pass. */
	validate(request: HttpRequest): Expectation[] | null {
		const diagnostics = this.failures(request).map((f) => f.actual);
		return diagnostics.length === 0 ? null : diagnostics;
	}

	/** Failing rules paired with their diagnostics, in rule order. */
	failures(request: HttpRequest): Failure[] {
		const failures: Failure[] = [];
		for (const expected of this.items) {
			const actual = expected.validate(request);
			if (actual !== null) failures.push({ expected, actual });
		}
		return failures;
	}

	/**
	 * Same rules in the same order, each failing one replaced by its
	 * diagnostic. The result always matches `request`.
	 */
	corrected(request: HttpRequest): Expectations {
		return new Expectations(this.items.map((e) => e.validate(request) ?? e));
	}

	/** Multi-line mismatch report, or null when the request matches. */
	describeMismatch(request: HttpRequest): string | null {
		const failures = this.failures(request);
		if (failures.length === 0) return null;
		return formatMismatch(request, failures, this.items.length);
	}

	assertMatched(request: HttpRequest): void {
		const failures = this.failures(request);
		if (failures.length === 0) return;

		const message = formatMismatch(request, failures, this.items.length);
		logger.debug(message);
		throw new ExpectationMismatchError(
			message,
			request,
			failures.map((f) => f.actual),
		);
	}
}

function formatMismatch(request: HttpRequest, failures: readonly Failure[], total: number): string {
	const lines = [`request ${request} failed ${failures.length} of ${total} expectations:`];
	for (const { expected, actual } of failures) {
		lines.push(`  expected ${expected}, got ${actual}`);
	}
	return lines.join("\n");
}
