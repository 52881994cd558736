import {
	ApiProperty,
	ApiPropertyOptional,
	getSchemaPath,
} from "@nestjs/swagger";

export type ApiPaginatedMeta = {
	nextCursor?: string;
	total: number;
};

export type ApiPaginatedEnvelope<T> = {
	data: T;
	meta: ApiPaginatedMeta;
};

export type ApiEnvelope<T> = {
	data: T;
};

/**
 * Keyset position in a newest-first listing: rows strictly older than
 * `createdBefore`, or equally old with a smaller `idBefore`.
 */
export type Cursor = {
	createdBefore?: number;
	idBefore?: number;
};
export const emptyCursor: Cursor = {
	createdBefore: undefined,
	idBefore: undefined,
};

/**
 * Parses a base64 cursor of the form `<createdAtMs>:<id>`.
 * Unparseable halves come back as `undefined`.
 */
export function cursorFromString(cursor: string): Cursor {
	const raw = Buffer.from(cursor, "base64").toString("utf8");
	const [tsStr, idStr] = raw.split(":");
	const ts = Number(tsStr);
	const idNum = Number(idStr);
	return {
		createdBefore: tsStr !== "" && Number.isFinite(ts) ? ts : undefined,
		idBefore: idStr !== undefined && Number.isFinite(idNum) ? idNum : undefined,
	};
}

export function cursorToString(createdAtMs: number, id: number): string {
	return Buffer.from(`${createdAtMs}:${id}`, "utf8").toString("base64");
}

export function isAfterCursor(
	row: { createdAt: number; id: number },
	cursor: Cursor,
): boolean {
	if (cursor.createdBefore === undefined || cursor.idBefore === undefined) {
		return true;
	}
	return (
		row.createdAt < cursor.createdBefore ||
		(row.createdAt === cursor.createdBefore && row.id < cursor.idBefore)
	);
}

export const envelope = <T>(data: T): ApiEnvelope<T> => ({ data });

export const paginatedEnvelope = <T>(
	data: T,
	meta: ApiPaginatedMeta,
): ApiPaginatedEnvelope<T> => ({
	data,
	meta,
});

/**
 * Swagger-only DTOs describing the envelope in responses, composed with
 * `getSchemaPath` in controllers.
 */
export class ApiPaginatedMetaDto implements ApiPaginatedMeta {
	@ApiPropertyOptional({
		description:
			"Opaque cursor to fetch the next page. Omitted when there is no next page.",
		example: "MTczMjc5NDQ2NTAwMDoxMjM0NQ==",
	})
	nextCursor?: string;

	@ApiProperty({
		description: "Total number of items across all pages (for this query).",
		example: 42,
	})
	total!: number;
}

/** `data` is overridden per-endpoint in controller schemas. */
export class ApiEnvelopeShellDto<T> {
	@ApiProperty({
		description: "Payload for this endpoint (shape varies by route)",
	})
	data!: T;
}

export function getSchemaPathForDto(dto: Parameters<typeof getSchemaPath>[0]) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{
				type: "object",
				properties: {
					data: { $ref: getSchemaPath(dto) },
				},
				required: ["data"],
			},
		],
	};
}

export function getSchemaPathForPaginatedDto(
	dto: Parameters<typeof getSchemaPath>[0],
) {
	return {
		allOf: [
			{ $ref: getSchemaPath(ApiEnvelopeShellDto) },
			{
				type: "object",
				properties: {
					data: {
						type: "array",
						items: { $ref: getSchemaPath(dto) },
					},
					meta: { $ref: getSchemaPath(ApiPaginatedMetaDto) },
				},
				required: ["data", "meta"],
			},
		],
	};
}
