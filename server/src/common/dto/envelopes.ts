import {
	ApiProperty,
	ApiPropertyOptional,
	getSchemaPath,
} from "@nestjs/swagger";

/**
 * Every response body is `{ data }`, list endpoints add `meta`.
 */
export type ApiEnvelope<T> = { data: T };

export type ApiPaginatedEnvelope<T> = ApiEnvelope<T> & {
	meta: { nextCursor?: string; total: number };
};

export function envelope(): ApiEnvelope<Record<string, never>>;
export function envelope<T>(data: T): ApiEnvelope<T>;
export function envelope<T>(data?: T): ApiEnvelope<T | Record<string, never>> {
	return { data: data ?? {} };
}

export function paginatedEnvelope<T>(
	data: T,
	meta: ApiPaginatedEnvelope<T>["meta"],
): ApiPaginatedEnvelope<T> {
	return { data, meta };
}

// ==================== Cursors ====================

/** Keyset position over `(createdAt, id)`, newest first. */
export type Cursor = {
	createdBefore?: Date;
	idBefore?: number;
};

export const emptyCursor: Cursor = {};

export function cursorToString(createdAt: Date, id: number): string {
	return Buffer.from(`${createdAt.getTime()}:${id}`, "utf8").toString("base64");
}

/**
 * @throws Error unless the cursor decodes to `<epochMs>:<id>`
 */
export function cursorFromString(cursor: string): Cursor {
	const match = /^(\d+):(\d+)$/.exec(
		Buffer.from(cursor, "base64").toString("utf8"),
	);
	if (!match) {
		throw new Error(`Malformed cursor: ${cursor}`);
	}
	return { createdBefore: new Date(Number(match[1])), idBefore: Number(match[2]) };
}

// ==================== Swagger ====================

export class ApiEnvelopeShellDto {
	@ApiProperty({ description: "Route-specific payload" })
	data!: unknown;
}

export class ApiPaginatedMetaDto {
	@ApiPropertyOptional({
		description: "Pass back to fetch the next page; absent on the last one",
		example: "MTcwMDAwMDAwMDAwMDo0Mg==",
	})
	nextCursor?: string;

	@ApiProperty({ description: "Rows matching the query", example: 42 })
	total!: number;
}

type SchemaRef = Parameters<typeof getSchemaPath>[0];

function shell(properties: Record<string, object>) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{ type: "object", properties, required: Object.keys(properties) },
		],
	};
}

export const getSchemaPathForDto = (dto: SchemaRef) =>
	shell({ data: { $ref: getSchemaPath(dto) } });

export const getSchemaPathForEmptyResponse = () => shell({ data: {} });

export const getSchemaPathForPaginatedDto = (dto: SchemaRef) =>
	shell({
		data: { type: "array", items: { $ref: getSchemaPath(dto) } },
		meta: { $ref: getSchemaPath(ApiPaginatedMetaDto) },
	});
