/**
 * Fetch Transport
 *
 * HTTP transport built on the global `fetch`.
 *
 * Request options understood:
 * - `headers` - header map
 * - `params` - query parameters appended to the URL
 * - `json` - body sent as JSON with a JSON content type
 * - `body` / `data` - objects and arrays are JSON-encoded, strings sent verbatim
 * - `timeout` - milliseconds before the request is aborted
 *
 * Each instance is a session: cookies set by a response are stored in its
 * jar and sent with later requests to matching URLs. An explicit `Cookie`
 * header on a request replaces the jar's cookies for that request.
 *
 * Network failures are thrown as-is.
 */

import { CookieJar } from "tough-cookie";

import type { Value, ValueObject } from "../values";
import { isValueObject, stringifyValue, toValue } from "../values";
import type { DispatchRequest, HttpTransport, TransportResponse } from "./transport.types";

/**
 * Fetch transport options
 */
export interface FetchTransportOptions {
	/** Headers sent with every request, overridden per request */
	headers?: Record<string, string>;
	/** Default timeout in milliseconds */
	timeout?: number;
	/** Keep cookies across requests (default: true) */
	cookies?: boolean;
}

export class FetchTransport implements HttpTransport {
	readonly name = "fetch";
	readonly cookieJar?: CookieJar;

	constructor(private options: FetchTransportOptions = {}) {
		if (options.cookies ?? true) {
			this.cookieJar = new CookieJar();
		}
	}

	async dispatch(request: DispatchRequest): Promise<TransportResponse> {
		const { options } = request;
		const headers: Record<string, string> = {
			...this.options.headers,
			...toHeaders(options.headers),
		};

		const init: RequestInit = {
			method: request.method.toUpperCase(),
			headers,
		};

		const body = encodeBody(options, headers);
		if (body !== undefined) {
			init.body = body;
		}

		const timeout = typeof options.timeout === "number" ? options.timeout : this.options.timeout;
		if (timeout !== undefined) {
			init.signal = AbortSignal.timeout(timeout);
		}

		const url = buildUrl(request.url, options.params);
		if (this.cookieJar && !hasHeader(headers, "cookie")) {
			const cookie = await this.cookieJar.getCookieString(url);
			if (cookie) {
				headers.Cookie = cookie;
			}
		}

		const startTime = Date.now();
		const response = await fetch(url, init);

		if (this.cookieJar) {
			for (const setCookie of response.headers.getSetCookie()) {
				await this.cookieJar.setCookie(setCookie, url, { ignoreError: true });
			}
		}

		const responseHeaders: Record<string, string> = {};
		response.headers.forEach((value, key) => {
			responseHeaders[key.toLowerCase()] = value;
		});

		const text = await response.text();
		const contentType = response.headers.get("content-type");

		return {
			status: response.status,
			headers: responseHeaders,
			body: contentType?.includes("json") && text ? toValue(JSON.parse(text)) : text,
			elapsed: Date.now() - startTime,
		};
	}
}

/**
 * Create a fetch transport
 */
export function createFetchTransport(options?: FetchTransportOptions): FetchTransport {
	return new FetchTransport(options);
}

// =============================================================================
// Helpers
// =============================================================================

function toHeaders(value: Value | undefined): Record<string, string> {
	const headers: Record<string, string> = {};
	if (!isValueObject(value)) {
		return headers;
	}
	for (const [name, item] of Object.entries(value)) {
		if (item !== null) {
			headers[name] = stringifyValue(item);
		}
	}
	return headers;
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
	const lower = name.toLowerCase();
	return Object.keys(headers).some((key) => key.toLowerCase() === lower);
}

function encodeBody(options: ValueObject, headers: Record<string, string>): string | undefined {
	if (options.json !== undefined) {
		if (!hasHeader(headers, "content-type")) {
			headers["Content-Type"] = "application/json";
		}
		return JSON.stringify(options.json);
	}

	const body = options.body ?? options.data;
	if (body === undefined || body === null) {
		return undefined;
	}
	if (typeof body === "string") {
		return body;
	}
	if (!hasHeader(headers, "content-type")) {
		headers["Content-Type"] = "application/json";
	}
	return JSON.stringify(body);
}

function buildUrl(url: string, params: Value | undefined): string {
	if (!isValueObject(params)) {
		return url;
	}
	const target = new URL(url);
	for (const [name, item] of Object.entries(params)) {
		if (item !== null) {
			target.searchParams.append(name, stringifyValue(item));
		}
	}
	return target.toString();
}
