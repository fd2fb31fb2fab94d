export type TaskStatusCode = 200 | 201 | 204 | 400 | 404 | 500;

export interface Envelope {
	statusCode: TaskStatusCode;
	headers: {
		"Content-Type": "application/json";
		"Access-Control-Allow-Origin": "*";
	};
	body: string;
}

interface NumberLike {
	toNumber(): number;
}

function isNumberLike(value: unknown): value is NumberLike {
	return (
		typeof value === "object" &&
		value !== null &&
		"toNumber" in value &&
		typeof value.toNumber === "function"
	);
}

// bigint and decimal-like values become plain (possibly lossy) JSON numbers.
// Decimal libraries define toJSON(), which runs before the replacer, so the
// raw value is read back from the holder.
function toJsonNumber(this: unknown, key: string, value: unknown): unknown {
	const holder: unknown = this;
	const raw: unknown = typeof holder === "object" && holder !== null ? Reflect.get(holder, key) : value;

	if (typeof raw === "bigint") return Number(raw);
	if (isNumberLike(raw)) return raw.toNumber();
	return value;
}

/**
 * Wrap a status and a body value into the response envelope.
 * A 204 always carries an empty body.
 */
export function buildResponse(statusCode: TaskStatusCode, body: unknown): Envelope {
	return {
		statusCode,
		headers: {
			"Content-Type": "application/json",
			"Access-Control-Allow-Origin": "*",
		},
		body: statusCode === 204 ? "" : JSON.stringify(body, toJsonNumber),
	};
}

export const ok = (body: unknown) => buildResponse(200, body);
export const created = (body: unknown) => buildResponse(201, body);
export const noContent = () => buildResponse(204, null);
export const badRequest = (message: string) => buildResponse(400, { message });
export const notFound = (message: string) => buildResponse(404, { message });
export const internalError = (message: string) => buildResponse(500, { message });
