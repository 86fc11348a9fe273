import * as envelopes from "./envelopes";
import {
	cursorFromString,
	cursorToString,
	envelope,
	getSchemaPathForEmptyResponse,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "./envelopes";

class WidgetDto {}

describe("envelopes", () => {
	it("should only export what the controllers and pipes use", () => {
		expect(Object.keys(envelopes).sort()).toEqual([
			"ApiEnvelopeShellDto",
			"ApiPaginatedMetaDto",
			"cursorFromString",
			"cursorToString",
			"emptyCursor",
			"envelope",
			"getSchemaPathForDto",
			"getSchemaPathForEmptyResponse",
			"getSchemaPathForPaginatedDto",
			"paginatedEnvelope",
		]);
	});

	it("should wrap payloads", () => {
		expect(envelope()).toEqual({ data: {} });
		expect(envelope([1, 2])).toEqual({ data: [1, 2] });
		expect(paginatedEnvelope([], { total: 0 })).toEqual({
			data: [],
			meta: { total: 0 },
		});
	});

	describe("cursors", () => {
		it("should encode createdAt and id", () => {
			const cursor = cursorToString(new Date(1_700_000_000_000), 42);

			expect(cursor).toBe("MTcwMDAwMDAwMDAwMDo0Mg==");
			expect(cursorFromString(cursor)).toEqual({
				createdBefore: new Date(1_700_000_000_000),
				idBefore: 42,
			});
		});

		it("should reject anything else", () => {
			const garbage = Buffer.from("yesterday:42").toString("base64");
			expect(() => cursorFromString(garbage)).toThrow(
				`Malformed cursor: ${garbage}`,
			);
		});
	});

	describe("swagger schemas", () => {
		it("should describe an empty response", () => {
			expect(getSchemaPathForEmptyResponse()).toEqual({
				allOf: [
					{ $ref: "#/components/schemas/ApiEnvelopeShellDto" },
					{ type: "object", properties: { data: {} }, required: ["data"] },
				],
			});
		});

		it("should describe a page of items with its meta", () => {
			expect(getSchemaPathForPaginatedDto(WidgetDto)).toEqual({
				allOf: [
					{ $ref: "#/components/schemas/ApiEnvelopeShellDto" },
					{
						type: "object",
						properties: {
							data: {
								type: "array",
								items: { $ref: "#/components/schemas/WidgetDto" },
							},
							meta: { $ref: "#/components/schemas/ApiPaginatedMetaDto" },
						},
						required: ["data", "meta"],
					},
				],
			});
		});
	});
});
