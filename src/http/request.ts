/**
 * Decoded HTTP-like request that expectations are validated against.
 *
 * Query values are `string | null`: `null` marks a key given without `=value`,
 * which is a different state from an absent key. Header keys and values are
 * stored verbatim (no case folding).
 *
 * Matching never mutates a request. The `set*` methods exist for callers that
 * assemble a request field by field before handing it over; the `with*`
 * methods return a copy and leave the receiver untouched.
 */

export type QueryValue = string | null;

/** Plain-object form accepted by the constructor and `HttpRequest.from`. */
export interface HttpRequestInit {
	readonly method?: string;
	readonly path?: string;
	readonly query?: Readonly<Record<string, QueryValue>>;
	readonly fragment?: string | null;
	readonly headers?: Readonly<Record<string, string>>;
	readonly body?: string | null;
}

export class HttpRequest {
	private methodValue: string;
	private pathValue: string;
	private queryParams: Map<string, QueryValue>;
	private fragmentValue: string | null;
	private headerValues: Map<string, string>;
	private bodyValue: string | null;

	constructor(init: HttpRequestInit = {}) {
		this.methodValue = init.method ?? "GET";
		this.pathValue = normalizePath(init.path ?? "/");
		this.queryParams = new Map(Object.entries(init.query ?? {}));
		this.fragmentValue = normalizeFragment(init.fragment ?? null);
		this.headerValues = new Map(Object.entries(init.headers ?? {}));
		this.bodyValue = init.body ?? null;
	}

	static from(init: HttpRequestInit): HttpRequest {
		return new HttpRequest(init);
	}

	static parse(text: string): HttpRequest {
		return parseRequest(text);
	}

	get method(): string {
		return this.methodValue;
	}

	get path(): string {
		return this.pathValue;
	}

	get query(): ReadonlyMap<string, QueryValue> {
		return this.queryParams;
	}

	get fragment(): string | null {
		return this.fragmentValue;
	}

	get headers(): ReadonlyMap<string, string> {
		return this.headerValues;
	}

	get body(): string | null {
		return this.bodyValue;
	}

	// ── In-place setters ────────────────────────────────────────────────

	setMethod(method: string): void {
		this.methodValue = method;
	}

	/** Prefixes `/` when missing; an empty path becomes `/`. */
	setPath(path: string): void {
		this.pathValue = normalizePath(path);
	}

	/** Omitting `value` records a flag-style key (`?debug`). */
	setQuery(key: string, value: QueryValue = null): void {
		this.queryParams.set(key, value);
	}

	/** An empty fragment is stored as absent. */
	setFragment(fragment: string | null): void {
		this.fragmentValue = normalizeFragment(fragment);
	}

	setHeader(key: string, value: string): void {
		this.headerValues.set(key, value);
	}

	setBody(body: string | null): void {
		this.bodyValue = body;
	}

	// ── Copying builders ────────────────────────────────────────────────

	withMethod(method: string): HttpRequest {
		const next = this.copy();
		next.setMethod(method);
		return next;
	}

	withPath(path: string): HttpRequest {
		const next = this.copy();
		next.setPath(path);
		return next;
	}

	withQuery(key: string, value: QueryValue = null): HttpRequest {
		const next = this.copy();
		next.setQuery(key, value);
		return next;
	}

	withoutQuery(key: string): HttpRequest {
		const next = this.copy();
		next.queryParams.delete(key);
		return next;
	}

	withFragment(fragment: string | null): HttpRequest {
		const next = this.copy();
		next.setFragment(fragment);
		return next;
	}

	withHeader(key: string, value: string): HttpRequest {
		const next = this.copy();
		next.setHeader(key, value);
		return next;
	}

	withoutHeader(key: string): HttpRequest {
		const next = this.copy();
		next.headerValues.delete(key);
		return next;
	}

	withBody(body: string | null): HttpRequest {
		const next = this.copy();
		next.setBody(body);
		return next;
	}

	/** Structural equality. Query and header order is not significant. */
	equals(other: HttpRequest): boolean {
		return (
			this.methodValue === other.methodValue &&
			this.pathValue === other.pathValue &&
			this.fragmentValue === other.fragmentValue &&
			this.bodyValue === other.bodyValue &&
			sameEntries(this.queryParams, other.queryParams) &&
			sameEntries(this.headerValues, other.headerValues)
		);
	}

	/**
	 * Canonical single-line rendering used in diagnostics:
	 * `[METHOD PATH[?query][#fragment][ | with headers {...}][ | with body "..."]]`.
	 */
	toString(): string {
		let out = `${this.methodValue} ${this.pathValue}`;
		if (this.queryParams.size > 0) {
			out += `?${renderQuery(this.queryParams)}`;
		}
		if (this.fragmentValue !== null) {
			out += `#${this.fragmentValue}`;
		}
		if (this.headerValues.size > 0) {
			out += ` | with headers {${renderHeaders(this.headerValues)}}`;
		}
		if (this.bodyValue !== null) {
			out += ` | with body ${JSON.stringify(this.bodyValue)}`;
		}
		return `[${out}]`;
	}

	private copy(): HttpRequest {
		const next = new HttpRequest();
		next.methodValue = this.methodValue;
		next.pathValue = this.pathValue;
		next.queryParams = new Map(this.queryParams);
		next.fragmentValue = this.fragmentValue;
		next.headerValues = new Map(this.headerValues);
		next.bodyValue = this.bodyValue;
		return next;
	}
}

/**
 * Parse a URI-like string into a request. Never throws.
 *
 * Grammar: `['/'] [path] ['?' pair ('&' pair)*] ['#' fragment]`,
 * `pair := key ['=' value]`. Later duplicate query keys overwrite earlier
 * ones; an empty pair (`a&&b`) records the key `""` with no value.
 */
export function parseRequest(text: string): HttpRequest {
	let rest = text.trim();
	if (rest.startsWith("/")) rest = rest.slice(1);

	const [beforeFragment, fragment] = splitOnce(rest, "#");
	const [path, queryString] = splitOnce(beforeFragment, "?");
	const request = new HttpRequest({ path: `/${path}`, fragment });

	if (queryString !== null) {
		for (const pair of queryString.split("&")) {
			const [key, value] = splitOnce(pair, "=");
			request.setQuery(key, value);
		}
	}
	return request;
}

/** Split at the first delimiter. An empty right-hand side comes back as null. */
function splitOnce(input: string, delimiter: string): [string, string | null] {
	const idx = input.indexOf(delimiter);
	if (idx < 0) return [input, null];
	const right = input.slice(idx + delimiter.length);
	return [input.slice(0, idx), right === "" ? null : right];
}

function normalizePath(path: string): string {
	if (path === "") return "/";
	return path.startsWith("/") ? path : `/${path}`;
}

function normalizeFragment(fragment: string | null): string | null {
	return fragment === "" ? null : fragment;
}

function renderQuery(query: ReadonlyMap<string, QueryValue>): string {
	const pairs: string[] = [];
	for (const [key, value] of query) {
		pairs.push(value === null ? key : `${key}=${value}`);
	}
	return pairs.join("&");
}

function renderHeaders(headers: ReadonlyMap<string, string>): string {
	const pairs: string[] = [];
	for (const [key, value] of headers) {
		pairs.push(`${JSON.stringify(key)} = ${JSON.stringify(value)}`);
	}
	return pairs.join(", ");
}

function sameEntries<V>(a: ReadonlyMap<string, V>, b: ReadonlyMap<string, V>): boolean {
	if (a.size !== b.size) return false;
	for (const [key, value] of a) {
		if (!b.has(key) || b.get(key) !== value) return false;
	}
	return true;
}
