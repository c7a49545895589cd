import type { ExpectationConfig } from "./config.ts";
import type { HttpRequest } from "./http/request.ts";

/**
 * Expectation variants.
 *
 * One closed union serves both as the rule and as the diagnostic: a failed
 * `validate()` returns a variant of the same union describing what the
 * request actually carries. Re-validating that diagnostic against the same
 * request always returns null.
 *
 * `*Exists` / `*Miss` test presence only. `*Eq` tests content, and reports a
 * query key given without a value as `QueryExists`, not as a value mismatch.
 */

/** HTTP method, compared case-insensitively. The diagnostic keeps the raw method. */
export class Method {
	readonly kind = "method";

	constructor(readonly value: string) {}

	validate(request: HttpRequest): Expectation | null {
		if (request.method.toUpperCase() === this.value.toUpperCase()) return null;
		return new Method(request.method);
	}

	toConfig(): ExpectationConfig {
		return { type: this.kind, value: this.value };
	}

	toString(): string {
		return `Method(${quote(this.value)})`;
	}
}

/** Exact, case-sensitive path equality. */
export class Path {
	readonly kind = "path";

	constructor(readonly value: string) {}

	validate(request: HttpRequest): Expectation | null {
		if (request.path === this.value) return null;
		return new Path(request.path);
	}

	toConfig(): ExpectationConfig {
		return { type: this.kind, value: this.value };
	}

	toString(): string {
		return `Path(${quote(this.value)})`;
	}
}

export class QueryExists {
	readonly kind = "query_exists";

	constructor(readonly key: string) {}

	validate(request: HttpRequest): Expectation | null {
		return request.query.has(this.key) ? null : new QueryMiss(this.key);
	}

	toConfig(): ExpectationConfig {
		return { type: this.kind, key: this.key };
	}

	toString(): string {
		return `QueryExists(${quote(this.key)})`;
	}
}

export class QueryMiss {
	readonly kind = "query_miss";

	constructor(readonly key: string) {}

	validate(request: HttpRequest): Expectation | null {
		return request.query.has(this.key) ? new QueryExists(this.key) : null;
	}

	toConfig(): ExpectationConfig {
		return { type: this.kind, key: this.key };
	}

	toString(): string {
		return `QueryMiss(${quote(this.key)})`;
	}
}

export class QueryEq {
	readonly kind = "query_eq";

	constructor(
		readonly key: string,
		readonly value: string,
	) {}

	validate(request: HttpRequest): Expectation | null {
		const actual = request.query.get(this.key);
		// undefined: key absent; null: key given without a value
		if (actual === undefined) return new QueryMiss(this.key);
		if (actual === null) return new QueryExists(this.key);
		return actual === this.value ? null : new QueryEq(this.key, actual);
	}

	toConfig(): ExpectationConfig {
		return { type: this.kind, key: this.key, value: this.value };
	}

	toString(): string {
		return `QueryEq(${quote(this.key)}, ${quote(this.value)})`;
	}
}

export class FragmentEq {
	readonly kind = "fragment_eq";

	constructor(readonly value: string) {}

	validate(request: HttpRequest): Expectation | null {
		const actual = request.fragment;
		if (actual === null) return new FragmentMiss();
		return actual === this.value ? null : new FragmentEq(actual);
	}

	toConfig(): ExpectationConfig {
		return { type: this.kind, value: this.value };
	}

	toString(): string {
		return `FragmentEq(${quote(this.value)})`;
	}
}

export class FragmentMiss {
	readonly kind = "fragment_miss";

	validate(request: HttpRequest): Expectation | null {
		const actual = request.fragment;
		return actual === null ? null : new FragmentEq(actual);
	}

	toConfig(): ExpectationConfig {
		return { type: this.kind };
	}

	toString(): string {
		return "FragmentMiss";
	}
}

/** Header presence. Keys are exact-match; no case folding. */
export class HeaderExists {
	readonly kind = "header_exists";

	constructor(readonly key: string) {}

	validate(request: HttpRequest): Expectation | null {
		return request.headers.has(this.key) ? null : new HeaderMiss(this.key);
	}

	toConfig(): ExpectationConfig {
		return { type: this.kind, key: this.key };
	}

	toString(): string {
		return `HeaderExists(${quote(this.key)})`;
	}
}

export class HeaderMiss {
	readonly kind = "header_miss";

	constructor(readonly key: string) {}

	validate(request: HttpRequest): Expectation | null {
		return request.headers.has(this.key) ? new HeaderExists(this.key) : null;
	}

	toConfig(): ExpectationConfig {
		return { type: this.kind, key: this.key };
	}

	toString(): string {
		return `HeaderMiss(${quote(this.key)})`;
	}
}

export class HeaderEq {
	readonly kind = "header_eq";

	constructor(
		readonly key: string,
		readonly value: string,
	) {}

	validate(request: HttpRequest): Expectation | null {
		const actual = request.headers.get(this.key);
		if (actual === undefined) return new HeaderMiss(this.key);
		return actual === this.value ? null : new HeaderEq(this.key, actual);
	}

	toConfig(): ExpectationConfig {
		return { type: this.kind, key: this.key, value: this.value };
	}

	toString(): string {
		return `HeaderEq(${quote(this.key)}, ${quote(this.value)})`;
	}
}

export class BodyMiss {
	readonly kind = "body_miss";

	validate(request: HttpRequest): Expectation | null {
		const actual = request.body;
		return actual === null ? null : new BodyEq(actual);
	}

	toConfig(): ExpectationConfig {
		return { type: this.kind };
	}

	toString(): string {
		return "BodyMiss";
	}
}

export class BodyEq {
	readonly kind = "body_eq";

	constructor(readonly value: string) {}

	validate(request: HttpRequest): Expectation | null {
		const actual = request.body;
		if (actual === null) return new BodyMiss();
		return actual === this.value ? null : new BodyEq(actual);
	}

	toConfig(): ExpectationConfig {
		return { type: this.kind, value: this.value };
	}

	toString(): string {
		return `BodyEq(${quote(this.value)})`;
	}
}

/** Discriminated union of all expectation variants. */
export type Expectation =
	| Method
	| Path
	| QueryExists
	| QueryMiss
	| QueryEq
	| FragmentEq
	| FragmentMiss
	| HeaderExists
	| HeaderMiss
	| HeaderEq
	| BodyMiss
	| BodyEq;

export type ExpectationKind = Expectation["kind"];

/** Structural equality: same variant, same fields. */
export function expectationEquals(a: Expectation, b: Expectation): boolean {
	const left = a.toConfig();
	const right = b.toConfig();
	return (
		left.type === right.type &&
		fieldOf(left, "key") === fieldOf(right, "key") &&
		fieldOf(left, "value") === fieldOf(right, "value")
	);
}

function fieldOf(config: ExpectationConfig, field: "key" | "value"): string | undefined {
	if (field === "key") return "key" in config ? config.key : undefined;
	return "value" in config ? config.value : undefined;
}

function quote(value: string): string {
	return JSON.stringify(value);
}
