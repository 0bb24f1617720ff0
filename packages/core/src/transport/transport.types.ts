/**
 * Transport Types
 *
 * Boundary between the runner and the component that performs HTTP calls.
 */

import type { Value, ValueObject } from "../values";

/**
 * Fully resolved request handed to a transport
 */
export interface DispatchRequest {
	url: string;
	method: string;
	/** Remaining resolved keys, passed through verbatim (headers, params, json, body...) */
	options: ValueObject;
}

/**
 * Response produced by a transport
 */
export interface TransportResponse {
	/** HTTP status code */
	status: number;
	/** Response headers, names lower-cased */
	headers: Record<string, string>;
	/** Parsed JSON body, or raw text */
	body: Value;
	/** Round-trip time in milliseconds */
	elapsed: number;
}

/**
 * Performs the network call for a resolved request
 */
export interface HttpTransport {
	/** Transport name for reporting */
	readonly name: string;

	dispatch(request: DispatchRequest): Promise<TransportResponse>;
}
