// Table model - column-oriented input for profiling and mapping

export {
	createTable,
	fromRows,
	fromRecords,
	rowCount,
	columnNames,
	getColumn,
	toRecords,
} from "./table";
export { fromCsv } from "./csv";
export type { CsvOptions } from "./csv";
