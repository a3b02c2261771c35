import { describe, expect, test } from "vitest";
import { MappingConfigError } from "../errors";
import { fromCsv } from "./csv";
import { columnNames, createTable, fromRecords, fromRows, getColumn, rowCount, toRecords } from "./table";

describe("createTable", () => {
	test("keeps key order as column order", () => {
		const table = createTable({ b: [1, 2], a: ["x", "y"] });
		expect(columnNames(table)).toEqual(["b", "a"]);
		expect(rowCount(table)).toBe(2);
	});

	test("copies input arrays", () => {
		const values = [1, 2, 3];
		const table = createTable({ n: values });
		values.push(4);
		expect(getColumn(table, "n")?.values).toEqual([1, 2, 3]);
	});

	test("rejects columns of different length", () => {
		expect(() => createTable({ a: [1, 2], b: [1] })).toThrow(MappingConfigError);
		expect(() => createTable({ a: [1, 2], b: [1] })).toThrow("Column 'b' has 1 values, expected 2");
	});

	test("empty table", () => {
		const table = createTable({});
		expect(rowCount(table)).toBe(0);
		expect(columnNames(table)).toEqual([]);
	});
});

describe("fromRows", () => {
	test("transposes rows into columns", () => {
		const table = fromRows(["id", "name"], [
			[1, "a"],
			[2, "b"],
		]);
		expect(getColumn(table, "id")?.values).toEqual([1, 2]);
		expect(getColumn(table, "name")?.values).toEqual(["a", "b"]);
	});

	test("pads short rows and drops extra cells", () => {
		const table = fromRows(["a", "b"], [[1], [2, 3, 4]]);
		expect(getColumn(table, "a")?.values).toEqual([1, 2]);
		expect(getColumn(table, "b")?.values).toEqual([null, 3]);
	});

	test("rejects duplicate headers", () => {
		expect(() => fromRows(["a", "a"], [])).toThrow("Duplicate column name 'a'");
	});
});

describe("fromRecords / toRecords", () => {
	test("columns are the union of keys in first-seen order", () => {
		const table = fromRecords([{ a: 1 }, { b: 2, a: 3 }]);
		expect(columnNames(table)).toEqual(["a", "b"]);
		expect(getColumn(table, "b")?.values).toEqual([null, 2]);
	});

	test("round trip", () => {
		const records = [
			{ id: 1, city: "Seoul" },
			{ id: 2, city: "Busan" },
		];
		expect(toRecords(fromRecords(records))).toEqual(records);
	});

	test("missing column lookup", () => {
		expect(getColumn(fromRecords([{ a: 1 }]), "b")).toBeUndefined();
	});
});

describe("fromCsv", () => {
	test("header row plus string cells", () => {
		const table = fromCsv("name,qty\nWidget,1\nGadget,2\n");
		expect(columnNames(table)).toEqual(["name", "qty"]);
		expect(getColumn(table, "qty")?.values).toEqual(["1", "2"]);
	});

	test("empty cells become null and short rows are padded", () => {
		const table = fromCsv("a,b,c\n1,,3\n4,5\n");
		expect(getColumn(table, "b")?.values).toEqual([null, "5"]);
		expect(getColumn(table, "c")?.values).toEqual(["3", null]);
	});

	test("quoted fields, BOM and trimming", () => {
		const table = fromCsv('\uFEFFid, note\n1,"hello, world"\n');
		expect(columnNames(table)).toEqual(["id", "note"]);
		expect(getColumn(table, "note")?.values).toEqual(["hello, world"]);
	});

	test("custom delimiter", () => {
		const table = fromCsv("a;b\n1;2\n", { delimiter: ";" });
		expect(toRecords(table)).toEqual([{ a: "1", b: "2" }]);
	});

	test("skips blank lines", () => {
		expect(rowCount(fromCsv("a\n1\n\n2\n"))).toBe(2);
	});

	test("empty input has no header", () => {
		expect(() => fromCsv("")).toThrow("CSV input has no header row");
	});
});
